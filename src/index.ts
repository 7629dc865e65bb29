/**
 * Programmatic entry point.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ConsoleReporter, DockerCliEngine, HttpValidationClient, Packager} from 'blockpack'
 *
 * const engine = new DockerCliEngine()
 * await engine.check()
 *
 * const packager = new Packager(engine, new HttpValidationClient(), new ConsoleReporter())
 * const result = await packager.run('config.yaml', './build')
 * if (!result.ok) {
 *   console.error(result.error.kind, result.error.message)
 * }
 * ```
 */

export {
  ImageEngine,
  DockerCliEngine,
  dockerCliEnv,
  type BuildImageRequest,
  type EphemeralContainerRequest,
  type ImageConfig,
  type ImageInfo,
  type ProcessExit,
  type LogLine,
  type OnLogLine
} from './engine/index.js'

export * from './core/index.js'

export {loadSettings, type Settings} from './settings.js'
export {ok, err, attempt, type Ok, type Err, type Result} from './result.js'
export type {
  AlgorithmType,
  Distribution,
  DockerConfig,
  DockerfileVariant,
  LayerProgressState,
  Manifest,
  ManifestConfig,
  PackagingConfig
} from './types.js'

export {
  PackagingError,
  InvalidConfigError,
  InvalidManifestError,
  RequestFailedError,
  ImageNotFoundError,
  ImagePullError,
  BuildError,
  ContainerFaultError,
  EngineFaultError,
  UnsupportedDistributionError,
  IoFaultError,
  type ErrorKind,
  type RequestFailureReason
} from './errors.js'
