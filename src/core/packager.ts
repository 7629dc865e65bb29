import {mkdir} from 'node:fs/promises'
import {resolve} from 'node:path'
import {IoFaultError} from '../errors.js'
import type {ImageEngine} from '../engine/index.js'
import {err, ok, type Result} from '../result.js'
import type {Distribution, DockerfileVariant, Manifest} from '../types.js'
import {loadConfigFile} from './config-loader.js'
import {validateConfig} from './config-validator.js'
import {ImageAcquirer} from './image-acquirer.js'
import {ImageBuilder} from './image-builder.js'
import {ManifestBuilder} from './manifest-builder.js'
import {OsProber} from './os-prober.js'
import type {Reporter, Stage} from './reporter.js'
import {materializeTemplates, selectDockerfileVariant, templatesDir} from './template-materializer.js'
import type {ManifestValidationClient} from './validation-client.js'

/** What a successful run produced. */
export type PackageOutcome = {
  /** Tag of the built image */
  tag: string;
  /** Absolute path of the output directory */
  destination: string;
  /** Path of the persisted manifest */
  manifestPath: string;
  manifest: Manifest;
  distribution: Distribution;
  variant: DockerfileVariant;
}

export type PackagerOptions = {
  /** Directory holding the Dockerfile variants and helper scripts. */
  templatesDir?: string;
}

/**
 * Packages an existing image as a block.
 *
 * ## Workflow
 *
 * 1. **parse-config**: reads the YAML config file
 * 2. **validate-config**: checks the `docker` and `manifest` sections
 * 3. **acquire-image**: pulls the base image when the store lacks it
 * 4. **probe-os**: reads the base image's os-release and picks a Dockerfile variant
 * 5. **create-output-dir**: creates the destination (existing is fine)
 * 6. **build-manifest**: builds, validates and persists `UP42Manifest.json`
 * 7. **materialize-templates**: copies the Dockerfile and helper scripts
 * 8. **build-image**: builds and tags the block image
 *
 * The first failing stage ends the run and its error is returned as is.
 * Nothing done by earlier stages is undone: the output directory, a pulled
 * image or a persisted manifest may remain.
 */
export class Packager {
  private readonly acquirer: ImageAcquirer
  private readonly prober: OsProber
  private readonly manifestBuilder: ManifestBuilder
  private readonly imageBuilder: ImageBuilder
  private readonly templatesDir: string

  constructor(
    engine: ImageEngine,
    validationClient: ManifestValidationClient,
    private readonly reporter: Reporter,
    options: PackagerOptions = {}
  ) {
    this.acquirer = new ImageAcquirer(engine, reporter)
    this.prober = new OsProber(engine, reporter)
    this.manifestBuilder = new ManifestBuilder(validationClient, reporter)
    this.imageBuilder = new ImageBuilder(engine, reporter)
    this.templatesDir = options.templatesDir ?? templatesDir
  }

  async run(configFile: string, destination: string): Promise<Result<PackageOutcome>> {
    const startedAt = Date.now()
    const outputDir = resolve(destination)
    this.reporter.emit({event: 'PACKAGING_START', configFile, destination: outputDir})

    const raw = await this.stage('parse-config', async () => loadConfigFile(configFile))
    if (!raw.ok) {
      return raw
    }

    const config = await this.stage('validate-config', async () => validateConfig(raw.value))
    if (!config.ok) {
      return config
    }

    const {docker, manifest: manifestConfig} = config.value
    const baseImage = docker.input.base_image

    const image = await this.stage('acquire-image', async () => this.acquirer.ensurePresent(baseImage))
    if (!image.ok) {
      return image
    }

    const probed = await this.stage('probe-os', async () => this.probe(baseImage))
    if (!probed.ok) {
      return probed
    }

    const created = await this.stage('create-output-dir', async () => createOutputDir(outputDir))
    if (!created.ok) {
      return created
    }

    const manifest = await this.stage('build-manifest', async () => {
      const built = await this.manifestBuilder.build(manifestConfig)
      if (!built.ok) {
        return built
      }

      const persisted = await this.manifestBuilder.persist(built.value, outputDir)
      return persisted.ok ? ok({manifest: built.value, path: persisted.value}) : persisted
    })
    if (!manifest.ok) {
      return manifest
    }

    const {distribution} = probed.value
    const materialized = await this.stage('materialize-templates', async () => materializeTemplates(outputDir, distribution, this.templatesDir))
    if (!materialized.ok) {
      return materialized
    }

    const built = await this.stage('build-image', async () => this.imageBuilder.build(outputDir, docker))
    if (!built.ok) {
      return built
    }

    this.reporter.emit({
      event: 'PACKAGING_FINISHED',
      tag: built.value,
      destination: outputDir,
      distribution,
      durationMs: Date.now() - startedAt
    })

    return ok({
      tag: built.value,
      destination: outputDir,
      manifestPath: manifest.value.path,
      manifest: manifest.value.manifest,
      distribution,
      variant: materialized.value
    })
  }

  /**
   * Classifies the base image and checks a Dockerfile variant exists for it,
   * so an unsupported distribution stops the run before anything is written.
   */
  private async probe(baseImage: string): Promise<Result<{distribution: Distribution; variant: DockerfileVariant}>> {
    const distribution = await this.prober.classify(baseImage)
    if (!distribution.ok) {
      return distribution
    }

    const variant = selectDockerfileVariant(distribution.value)
    return variant.ok ? ok({distribution: distribution.value, variant: variant.value}) : variant
  }

  private async stage<T>(stage: Stage, operation: () => Promise<Result<T>>): Promise<Result<T>> {
    const startedAt = Date.now()
    this.reporter.emit({event: 'STAGE_STARTING', stage})

    const result = await operation()
    if (result.ok) {
      this.reporter.emit({event: 'STAGE_FINISHED', stage, durationMs: Date.now() - startedAt})
      return result
    }

    const {kind, message} = result.error
    this.reporter.emit({event: 'STAGE_FAILED', stage, kind, message})
    this.reporter.emit({event: 'PACKAGING_FAILED', stage, kind, message})
    return result
  }
}

async function createOutputDir(outputDir: string): Promise<Result<string>> {
  try {
    await mkdir(outputDir, {recursive: true})
  } catch (error: unknown) {
    return err(IoFaultError.from(error))
  }

  return ok(outputDir)
}
