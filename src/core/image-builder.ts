import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {BuildError, ImageNotFoundError} from '../errors.js'
import type {ImageConfig, ImageEngine, ImageInfo} from '../engine/index.js'
import {err, ok, type Result} from '../result.js'
import type {DockerConfig, Manifest} from '../types.js'
import {BuildLogWorker} from './build-log.js'
import {manifestFilename, serializeManifest} from './manifest-builder.js'
import type {Reporter} from './reporter.js'
import {manifestSchema} from './schemas.js'
import {errorMessage} from './utils.js'

/**
 * Command the packaged image wraps: the configured override, else the base
 * image's CMD, else its ENTRYPOINT. There is no default command.
 */
export function resolveRunCommand(override: string | undefined, image: ImageConfig): Result<string, BuildError> {
  if (override !== undefined) {
    return ok(override)
  }

  const command = hasValue(image.cmd) ? image.cmd : image.entrypoint
  if (!hasValue(command)) {
    return err(new BuildError('Unable to fetch CMD and ENTRYPOINT instruction in image.'))
  }

  return ok(Array.isArray(command) ? command.join(' ') : command)
}

/**
 * Working directory of the packaged image: the configured override, else the
 * base image's, with `/` standing in for an empty one.
 */
export function resolveWorkdir(override: string | undefined, image: ImageConfig): Result<string, BuildError> {
  if (override !== undefined) {
    return ok(override)
  }

  if (image.workingDir === undefined) {
    return err(new BuildError('Unable to fetch WorkingDir instruction in image.'))
  }

  return ok(image.workingDir || '/')
}

function hasValue(command: string[] | string | null | undefined): command is string[] | string {
  return command !== null && command !== undefined && command.length > 0
}

/**
 * Values for the ARG instructions of the block Dockerfiles.
 */
export function deriveBuildArgs(
  docker: DockerConfig,
  manifest: Manifest,
  image: ImageInfo
): Result<Record<string, string>, BuildError> {
  const {input, output} = docker
  const command = resolveRunCommand(input.command, image.config)
  if (!command.ok) {
    return command
  }

  const workdir = resolveWorkdir(output.workdir, image.config)
  if (!workdir.ok) {
    return workdir
  }

  const buildArgs: Record<string, string> = {
    BASE_IMAGE: input.base_image,
    MANIFEST: serializeManifest(manifest),
    PORT: String(input.exposed_port),
    PROCESS_ROUTE: input.routes.process,
    HEALTHCHECK_ROUTE: input.routes.healthcheck,
    RUN_COMMAND: command.value,
    TYPE: input.type,
    WORKDIR: workdir.value
  }

  if (input.resolution !== undefined) {
    buildArgs.RESOLUTION = String(input.resolution)
  }

  return ok(buildArgs)
}

/**
 * Builds the block image from a materialized build context.
 */
export class ImageBuilder {
  constructor(
    private readonly engine: ImageEngine,
    private readonly reporter: Reporter
  ) {}

  /**
   * Build `outputDir` into `tag`. The directory must already hold the
   * Dockerfile, the helper scripts and the persisted manifest.
   */
  async build(outputDir: string, docker: DockerConfig, tag: string = docker.output.tag): Promise<Result<string>> {
    const manifest = await this.readManifest(outputDir)
    if (!manifest.ok) {
      return manifest
    }

    const image = await this.inspectBaseImage(docker.input.base_image)
    if (!image.ok) {
      return image
    }

    const buildArgs = deriveBuildArgs(docker, manifest.value, image.value)
    if (!buildArgs.ok) {
      return buildArgs
    }

    this.detail(`Command to be run: ${buildArgs.value.RUN_COMMAND}`)
    this.detail(`Working directory to be used: ${buildArgs.value.WORKDIR}`)

    const worker = new BuildLogWorker(this.reporter)
    try {
      await this.engine.buildImage({contextDir: outputDir, tag, buildArgs: buildArgs.value}, line => {
        worker.observe(line)
      })
    } catch (error: unknown) {
      return err(new BuildError(`Build failed with following error: ${errorMessage(error)}`, {cause: error}))
    }

    // Verdict from the log marker only, never from the exit status.
    if (!worker.succeeded) {
      await this.removeTag(tag)
      return err(new BuildError('The build of the image failed. See logs above to have details.'))
    }

    this.detail(`Image built as ${tag}`)
    return ok(tag)
  }

  private async readManifest(outputDir: string): Promise<Result<Manifest>> {
    try {
      const content = await readFile(join(outputDir, manifestFilename), 'utf8')
      return ok(manifestSchema.parse(JSON.parse(content)))
    } catch (error: unknown) {
      return err(new BuildError(`Unable to read ${manifestFilename}: ${errorMessage(error)}`, {cause: error}))
    }
  }

  private async inspectBaseImage(reference: string): Promise<Result<ImageInfo>> {
    try {
      const image = await this.engine.inspectImage(reference)
      return image ? ok(image) : err(new ImageNotFoundError(reference))
    } catch (error: unknown) {
      return err(new BuildError(`Unable to inspect ${reference}: ${errorMessage(error)}`, {cause: error}))
    }
  }

  /**
   * Best-effort removal of whatever a failed build left under the tag.
   */
  private async removeTag(tag: string): Promise<void> {
    try {
      const leftover = await this.engine.inspectImage(tag)
      if (leftover) {
        await this.engine.removeImage(tag)
        this.detail(`Removed partially built image ${tag}`)
      }
    } catch (error: unknown) {
      this.reporter.log('build', 'stderr', `Unable to remove image ${tag}: ${errorMessage(error)}`)
    }
  }

  private detail(message: string): void {
    this.reporter.emit({event: 'STAGE_DETAIL', stage: 'build-image', message})
  }
}
