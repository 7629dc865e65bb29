/**
 * Image configuration fields the packager reads back from the store.
 * `null` mirrors what the engine reports for an unset instruction.
 */
export type ImageConfig = {
  cmd?: string[] | string | null;
  entrypoint?: string[] | string | null;
  /** Absent when the engine did not report the field at all. */
  workingDir?: string;
}

/**
 * An image resolved from the local store.
 */
export type ImageInfo = {
  /** Content-addressed image ID (e.g., sha256:…) */
  id: string;
  config: ImageConfig;
}

/**
 * Request to run a throwaway container that is removed once it exits.
 */
export type EphemeralContainerRequest = {
  /** Container name (used for Docker container identification) */
  name: string;
  /** Image to run; it must already be in the local store */
  image: string;
  /** Entrypoint override */
  entrypoint: string;
  /** Arguments passed to the entrypoint */
  args: string[];
}

/**
 * Request to build an image from a directory.
 */
export type BuildImageRequest = {
  /** Build context directory (must contain a Dockerfile) */
  contextDir: string;
  /** Tag given to the built image */
  tag: string;
  /** Values for the Dockerfile's ARG instructions */
  buildArgs: Record<string, string>;
}

/**
 * Exit status of a streamed engine process.
 */
export type ProcessExit = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Last stderr lines, for error messages */
  stderrTail: string[];
}
