import {copyFile} from 'node:fs/promises'
import {join} from 'node:path'
import {fileURLToPath} from 'node:url'
import {IoFaultError, UnsupportedDistributionError} from '../errors.js'
import {err, ok, type Result} from '../result.js'
import type {Distribution, DockerfileVariant} from '../types.js'

/** Root of the template files shipped with the package. */
export const templatesDir = fileURLToPath(new URL('../../templates/', import.meta.url))

/** Helper scripts copied into every build context, whatever the distribution. */
export const helperTemplates = ['run.py', 'run_command.sh'] as const

export function selectDockerfileVariant(distribution: Distribution): Result<DockerfileVariant, UnsupportedDistributionError> {
  switch (distribution) {
    case 'debian':
    case 'ubuntu': {
      return ok('debian')
    }

    case 'centos': {
      return ok('centos')
    }

    default: {
      return err(new UnsupportedDistributionError(distribution))
    }
  }
}

/**
 * Copies the build context templates into a directory: both helper scripts,
 * then the Dockerfile variant for the distribution.
 */
export async function materializeTemplates(
  outputDir: string,
  distribution: Distribution,
  sourceDir: string = templatesDir
): Promise<Result<DockerfileVariant>> {
  const variant = selectDockerfileVariant(distribution)
  if (!variant.ok) {
    return variant
  }

  try {
    for (const name of helperTemplates) {
      await copyFile(join(sourceDir, name), join(outputDir, name))
    }

    await copyFile(join(sourceDir, 'Dockerfiles', `${variant.value}.Dockerfile`), join(outputDir, 'Dockerfile'))
  } catch (error: unknown) {
    return err(IoFaultError.from(error))
  }

  return variant
}
