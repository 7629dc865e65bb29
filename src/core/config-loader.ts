import {readFile} from 'node:fs/promises'
import {parse as parseYaml, YAMLParseError} from 'yaml'
import {InvalidConfigError, IoFaultError} from '../errors.js'
import {err, ok, type Result} from '../result.js'

/**
 * Reads a YAML configuration file into an unvalidated mapping.
 */
export async function loadConfigFile(filePath: string): Promise<Result<Record<string, unknown>>> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    return err(IoFaultError.from(error))
  }

  return parseConfig(content)
}

export function parseConfig(content: string): Result<Record<string, unknown>> {
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      return err(new InvalidConfigError(error.message, {cause: error}))
    }

    throw error
  }

  if (!isMapping(parsed)) {
    return err(new InvalidConfigError('the document must be a mapping with "docker" and "manifest" sections'))
  }

  return ok(parsed)
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
