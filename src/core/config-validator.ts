import {InvalidConfigError} from '../errors.js'
import {err, ok, type Result} from '../result.js'
import type {PackagingConfig} from '../types.js'
import {formatIssue, packagingConfigSchema} from './schemas.js'

/**
 * Checks a parsed configuration against the `docker` and `manifest` schemas.
 *
 * Only the first violated constraint is reported, as `<dotted.path>: <message>`.
 * Scalars are coerced where the schema allows it (`exposed_port: "8080"`),
 * and unknown keys are dropped.
 */
export function validateConfig(raw: unknown): Result<PackagingConfig, InvalidConfigError> {
  const parsed = packagingConfigSchema.safeParse(raw)
  if (parsed.success) {
    return ok(parsed.data)
  }

  const [first] = parsed.error.issues
  return err(new InvalidConfigError(first ? formatIssue(first) : 'unknown schema violation', {cause: parsed.error}))
}
