import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {InvalidManifestError, IoFaultError} from '../errors.js'
import {err, ok, type Result} from '../result.js'
import type {Manifest, ManifestConfig} from '../types.js'
import type {Reporter} from './reporter.js'
import {formatIssue, manifestSchema, manifestSpecificationVersion} from './schemas.js'
import type {ManifestValidationClient} from './validation-client.js'

export const manifestFilename = 'UP42Manifest.json'

/**
 * Project the `manifest` config section onto the manifest shape.
 * The result is not validated yet.
 */
export function projectManifest(config: ManifestConfig): Record<string, unknown> {
  return {
    _up42_specification_version: manifestSpecificationVersion,
    name: config.name,
    type: config.type,
    tags: config.tags,
    display_name: config.display_name,
    description: config.description,
    parameters: config.parameters,
    machine: {
      type: config.machine
    },
    input_capabilities: config.input_capabilities,
    output_capabilities: config.output_capabilities
  }
}

/** Serialized form of a manifest, as persisted and as passed to the build. */
export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(manifest)
}

/**
 * Builds the block manifest and checks it twice: against the local versioned
 * schema, then against the platform validation endpoint.
 */
export class ManifestBuilder {
  constructor(
    private readonly validationClient: ManifestValidationClient,
    private readonly reporter: Reporter
  ) {}

  async build(config: ManifestConfig): Promise<Result<Manifest>> {
    const parsed = manifestSchema.safeParse(projectManifest(config))
    if (!parsed.success) {
      return err(new InvalidManifestError(parsed.error.issues.map(issue => formatIssue(issue)), {cause: parsed.error}))
    }

    const verdict = await this.validationClient.validate(parsed.data)
    if (!verdict.ok) {
      return verdict
    }

    if (!verdict.value.valid) {
      return err(new InvalidManifestError(verdict.value.errors))
    }

    this.reporter.emit({event: 'STAGE_DETAIL', stage: 'build-manifest', message: 'Manifest is valid'})
    return ok(parsed.data)
  }

  /**
   * Write the manifest to `<outputDir>/UP42Manifest.json`, replacing any
   * previous one.
   */
  async persist(manifest: Manifest, outputDir: string): Promise<Result<string>> {
    const filePath = join(outputDir, manifestFilename)
    try {
      await writeFile(filePath, serializeManifest(manifest), 'utf8')
    } catch (error: unknown) {
      return err(IoFaultError.from(error))
    }

    this.reporter.emit({event: 'STAGE_DETAIL', stage: 'build-manifest', message: `Manifest saved to ${filePath}`})
    return ok(filePath)
  }
}
