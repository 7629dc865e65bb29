export {Packager} from './packager.js'
export type {PackageOutcome, PackagerOptions} from './packager.js'
export {loadConfigFile, parseConfig} from './config-loader.js'
export {validateConfig} from './config-validator.js'
export {ImageAcquirer} from './image-acquirer.js'
export {OsProber, parseDistribution, osReleasePath} from './os-prober.js'
export {LayerProgressTable, PullProgressWorker, parsePullLine} from './pull-progress.js'
export type {LayerStatus} from './pull-progress.js'
export {BuildLogWorker, buildSuccessMarker} from './build-log.js'
export {HttpValidationClient, classifyRequestError, defaultValidationUrl} from './validation-client.js'
export type {HttpValidationClientOptions, ManifestValidationClient, RemoteVerdict} from './validation-client.js'
export {ManifestBuilder, manifestFilename, projectManifest, serializeManifest} from './manifest-builder.js'
export {materializeTemplates, selectDockerfileVariant, templatesDir} from './template-materializer.js'
export {ImageBuilder, deriveBuildArgs, resolveRunCommand, resolveWorkdir} from './image-builder.js'
export {ConsoleReporter, stages} from './reporter.js'
export type {
  Reporter,
  Stage,
  LogSource,
  PackagingEvent,
  PackagingStartEvent,
  StageStartingEvent,
  StageDetailEvent,
  LayerPulledEvent,
  StageFinishedEvent,
  StageFailedEvent,
  PackagingFinishedEvent,
  PackagingFailedEvent
} from './reporter.js'
export {formatDuration} from './utils.js'
