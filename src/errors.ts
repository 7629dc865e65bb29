export type ErrorKind =
  | 'INVALID_CONFIG'
  | 'INVALID_MANIFEST'
  | 'REQUEST_FAILED'
  | 'IMAGE_NOT_FOUND'
  | 'IMAGE_PULL_FAILED'
  | 'BUILD_FAILED'
  | 'CONTAINER_FAULT'
  | 'ENGINE_FAULT'
  | 'UNSUPPORTED_DISTRIBUTION'
  | 'IO_FAULT'

export class PackagingError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'PackagingError'
  }
}

// -- Configuration & manifest errors -----------------------------------------

export class InvalidConfigError extends PackagingError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', `Config file is invalid: ${message}`, options)
    this.name = 'InvalidConfigError'
  }
}

export class InvalidManifestError extends PackagingError {
  constructor(
    readonly errors: string[],
    options?: {cause?: unknown}
  ) {
    super('INVALID_MANIFEST', `Invalid manifest. Following errors encountered: ${errors.join('; ')}`, options)
    this.name = 'InvalidManifestError'
  }
}

export type RequestFailureReason = 'http' | 'connection' | 'timeout' | 'other'

const requestFailureLabels: Record<RequestFailureReason, string> = {
  http: 'HTTP error',
  connection: 'Error connecting',
  timeout: 'Timeout error',
  other: 'Unexpected error'
}

export class RequestFailedError extends PackagingError {
  constructor(
    readonly reason: RequestFailureReason,
    detail: string,
    readonly status?: number,
    options?: {cause?: unknown}
  ) {
    super('REQUEST_FAILED', `${requestFailureLabels[reason]}: ${detail}`, options)
    this.name = 'RequestFailedError'
  }
}

// -- Image engine errors -----------------------------------------------------

export class ImageNotFoundError extends PackagingError {
  constructor(
    readonly image: string,
    options?: {cause?: unknown}
  ) {
    super('IMAGE_NOT_FOUND', `Image "${image}" does not exist in the local image store`, options)
    this.name = 'ImageNotFoundError'
  }
}

export class ImagePullError extends PackagingError {
  constructor(
    readonly image: string,
    detail: string,
    options?: {cause?: unknown}
  ) {
    super('IMAGE_PULL_FAILED', `Failed to pull image "${image}": ${detail}`, options)
    this.name = 'ImagePullError'
  }
}

export class BuildError extends PackagingError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('BUILD_FAILED', message, options)
    this.name = 'BuildError'
  }
}

export class ContainerFaultError extends PackagingError {
  constructor(
    readonly exitCode: number,
    detail: string,
    options?: {cause?: unknown}
  ) {
    super('CONTAINER_FAULT', `Container exited with a non-zero exit code (${exitCode}): ${detail}`, options)
    this.name = 'ContainerFaultError'
  }
}

export class EngineFaultError extends PackagingError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ENGINE_FAULT', message, options)
    this.name = 'EngineFaultError'
  }
}

// -- Classification & filesystem errors --------------------------------------

export class UnsupportedDistributionError extends PackagingError {
  constructor(
    readonly distribution: string | undefined,
    options?: {cause?: unknown}
  ) {
    super(
      'UNSUPPORTED_DISTRIBUTION',
      distribution
        ? `This operating system is not supported yet: ${distribution}`
        : 'Unable to fetch the operating system of the base image',
      options
    )
    this.name = 'UnsupportedDistributionError'
  }
}

export class IoFaultError extends PackagingError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('IO_FAULT', message, options)
    this.name = 'IoFaultError'
  }

  /** Wraps a filesystem error, keeping its message. */
  static from(error: unknown): IoFaultError {
    return new IoFaultError(error instanceof Error ? error.message : String(error), {cause: error})
  }
}
