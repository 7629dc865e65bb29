import pino, {type Logger} from 'pino'
import type {ErrorKind} from '../errors.js'
import type {Distribution} from '../types.js'

/** Pipeline stages, in execution order. */
export const stages = [
  'parse-config',
  'validate-config',
  'acquire-image',
  'probe-os',
  'create-output-dir',
  'build-manifest',
  'materialize-templates',
  'build-image'
] as const

export type Stage = typeof stages[number]

/** Engine process whose output a log line comes from. */
export type LogSource = 'pull' | 'probe' | 'build'

/**
 * Discriminated union of packaging events.
 *
 * Lifecycle:
 * 1. PACKAGING_START - Packaging begins
 * 2. For each stage, in order:
 *    a. STAGE_STARTING
 *    b. any number of STAGE_DETAIL / LAYER_PULLED
 *    c. STAGE_FINISHED
 *       OR STAGE_FAILED - the run stops here
 * 3. PACKAGING_FINISHED
 *    OR PACKAGING_FAILED
 */
export type PackagingStartEvent = {
  event: 'PACKAGING_START';
  configFile: string;
  destination: string;
}

export type StageStartingEvent = {
  event: 'STAGE_STARTING';
  stage: Stage;
}

export type StageDetailEvent = {
  event: 'STAGE_DETAIL';
  stage: Stage;
  message: string;
}

export type LayerPulledEvent = {
  event: 'LAYER_PULLED';
  image: string;
  layerId: string;
  completed: number;
  total: number;
}

export type StageFinishedEvent = {
  event: 'STAGE_FINISHED';
  stage: Stage;
  durationMs: number;
}

export type StageFailedEvent = {
  event: 'STAGE_FAILED';
  stage: Stage;
  kind: ErrorKind;
  message: string;
}

export type PackagingFinishedEvent = {
  event: 'PACKAGING_FINISHED';
  tag: string;
  destination: string;
  distribution: Distribution;
  durationMs: number;
}

export type PackagingFailedEvent = {
  event: 'PACKAGING_FAILED';
  stage: Stage;
  kind: ErrorKind;
  message: string;
}

export type PackagingEvent =
  | PackagingStartEvent
  | StageStartingEvent
  | StageDetailEvent
  | LayerPulledEvent
  | StageFinishedEvent
  | StageFailedEvent
  | PackagingFinishedEvent
  | PackagingFailedEvent

/**
 * Interface for reporting packaging events.
 */
export type Reporter = {
  /** Reports pipeline and stage state transitions */
  emit(event: PackagingEvent): void;
  /** Reports engine process output (pull progress, probe output, build logs) */
  log(source: LogSource, stream: 'stdout' | 'stderr', line: string): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(logger?: Logger) {
    this.logger = logger ?? pino({level: 'info'})
  }

  emit(event: PackagingEvent): void {
    if (event.event === 'STAGE_FAILED' || event.event === 'PACKAGING_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(source: LogSource, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({source, stream, line})
  }
}
