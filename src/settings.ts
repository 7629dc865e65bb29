import process from 'node:process'
import {z} from 'zod'
import {formatIssue} from './core/schemas.js'
import {defaultValidationUrl} from './core/validation-client.js'

const settingsSchema = z.object({
  BLOCKPACK_VALIDATION_URL: z.string().url().default(defaultValidationUrl),
  BLOCKPACK_VALIDATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  BLOCKPACK_DOCKER_BINARY: z.string().min(1).default('docker')
})

/** Settings read from the environment (and from `.env` through dotenv). */
export type Settings = {
  validationUrl: string;
  validationTimeoutMs: number;
  dockerBinary: string;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env)
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    throw new Error(`Invalid environment: ${issue ? formatIssue(issue) : 'unknown error'}`)
  }

  return {
    validationUrl: parsed.data.BLOCKPACK_VALIDATION_URL,
    validationTimeoutMs: parsed.data.BLOCKPACK_VALIDATION_TIMEOUT_MS,
    dockerBinary: parsed.data.BLOCKPACK_DOCKER_BINARY
  }
}
