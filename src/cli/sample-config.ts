import {constants, copyFile} from 'node:fs/promises'
import {join} from 'node:path'
import {templatesDir} from '../core/template-materializer.js'

/**
 * Copy the annotated sample configuration to `target`.
 * @returns false when the file exists and `force` is not set
 */
export async function writeSampleConfig(
  target: string,
  options?: {force?: boolean; sourceDir?: string}
): Promise<boolean> {
  const source = join(options?.sourceDir ?? templatesDir, 'config.yaml')
  try {
    await copyFile(source, target, options?.force ? 0 : constants.COPYFILE_EXCL)
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false
    }

    throw error
  }

  return true
}
