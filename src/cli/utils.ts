import type {Command} from 'commander'
import {loadSettings, type Settings} from '../settings.js'

export type GlobalOptions = {
  json?: boolean;
  validationUrl?: string;
  validationTimeout?: number;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Settings from the environment, with command-line flags taking priority.
 */
export function resolveSettings(options: GlobalOptions, env?: NodeJS.ProcessEnv): Settings {
  const settings = loadSettings(env)
  return {
    ...settings,
    validationUrl: options.validationUrl ?? settings.validationUrl,
    validationTimeoutMs: options.validationTimeout ?? settings.validationTimeoutMs
  }
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`)
  }

  return parsed
}
