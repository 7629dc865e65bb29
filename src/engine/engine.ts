import type {BuildImageRequest, EphemeralContainerRequest, ImageInfo, ProcessExit} from './types.js'

/**
 * Log line from an engine process.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs while an engine process runs.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface to a local image engine.
 *
 * Implementations:
 * - `DockerCliEngine`: Uses Docker CLI
 *
 * Streaming operations (`pullImage`, `runEphemeral`, `buildImage`) hand every
 * output line to `onLogLine` from consumer tasks that run while the process
 * does. They only resolve once those consumers have drained both streams, so
 * callers can read whatever state their callback built up right away.
 *
 * Engine faults are thrown as `PackagingError` subclasses.
 */
export abstract class ImageEngine {
  /**
   * Verifies that the engine is available and functional.
   * @throws EngineFaultError if the engine is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Looks an image up in the local store.
   * @returns The image, or undefined when the store does not have it
   */
  abstract inspectImage(reference: string): Promise<ImageInfo | undefined>

  /**
   * Pulls an image from its registry, streaming progress lines.
   */
  abstract pullImage(reference: string, onLogLine: OnLogLine): Promise<ProcessExit>

  /**
   * Runs a container to completion and removes it, whatever the outcome.
   * @throws ImageNotFoundError if the image is not in the local store
   */
  abstract runEphemeral(request: EphemeralContainerRequest, onLogLine: OnLogLine): Promise<ProcessExit>

  /**
   * Builds and tags an image, streaming build output.
   */
  abstract buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<ProcessExit>

  /**
   * Removes an image from the local store.
   * @returns false when there was nothing to remove
   */
  abstract removeImage(reference: string): Promise<boolean>
}
