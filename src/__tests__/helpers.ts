import {execSync} from 'node:child_process'
import {mkdtemp, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ImageNotFoundError, type RequestFailedError} from '../errors.js'
import {ImageEngine, type LogLine, type OnLogLine} from '../engine/engine.js'
import type {BuildImageRequest, EphemeralContainerRequest, ImageConfig, ImageInfo, ProcessExit} from '../engine/types.js'
import {validateConfig} from '../core/config-validator.js'
import type {LogSource, PackagingEvent, Reporter} from '../core/reporter.js'
import {templatesDir} from '../core/template-materializer.js'
import type {ManifestValidationClient, RemoteVerdict} from '../core/validation-client.js'
import {ok, type Result} from '../result.js'
import type {Manifest, PackagingConfig} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'blockpack-test-'))
}

/**
 * Silent reporter — all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

export type RecordedLog = {
  source: LogSource;
  stream: 'stdout' | 'stderr';
  line: string;
}

/**
 * Returns a reporter that records events and log lines for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PackagingEvent[]; logs: RecordedLog[]} {
  const events: PackagingEvent[] = []
  const logs: RecordedLog[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(source, stream, line) {
      logs.push({source, stream, line})
    }
  }

  return {reporter, events, logs}
}

/** Messages of the STAGE_DETAIL events, in order. */
export function detailMessages(events: PackagingEvent[]): string[] {
  return events.flatMap(event => event.event === 'STAGE_DETAIL' ? [event.message] : [])
}

export function imageInfo(reference: string, config: ImageConfig = {}): ImageInfo {
  return {id: `sha256:${reference.replaceAll(/\W/g, '')}`, config}
}

const stdout = (line: string): LogLine => ({stream: 'stdout', line})

export const successfulBuildLines: LogLine[] = [
  stdout('Step 1/14 : ARG BASE_IMAGE'),
  stdout(' ---> Running in 4f1c2a9e7d30'),
  stdout('Successfully built 0123456789ab'),
  stdout('Successfully tagged my-block:latest')
]

export const failedBuildLines: LogLine[] = [
  stdout('Step 1/14 : ARG BASE_IMAGE'),
  {stream: 'stderr', line: 'The command \'/bin/sh -c apt-get install -y python3\' returned a non-zero code: 100'}
]

/** Pull output for an image with two layers. */
export function pullLines(reference: string): LogLine[] {
  return [
    stdout(`${reference.split(':')[1] ?? 'latest'}: Pulling from library/${reference.split(':')[0] ?? reference}`),
    stdout('aaaaaaaaaaaa: Pulling fs layer'),
    stdout('bbbbbbbbbbbb: Pulling fs layer'),
    stdout('aaaaaaaaaaaa: Downloading [=====>     ] 1MB/2MB'),
    stdout('aaaaaaaaaaaa: Pull complete'),
    stdout('bbbbbbbbbbbb: Pull complete'),
    stdout('Digest: sha256:00112233'),
    stdout(`Status: Downloaded newer image for ${reference}`)
  ]
}

type RegistryEntry = {
  lines: LogLine[];
  /** Image stored once the pull completes; none means the pull leaves nothing behind. */
  image?: ImageInfo;
}

/**
 * In-memory image engine: a local store, a registry to pull from, the
 * os-release content of each image and a scripted build.
 */
export class FakeImageEngine extends ImageEngine {
  readonly images = new Map<string, ImageInfo>()
  readonly registry = new Map<string, RegistryEntry>()
  readonly osRelease = new Map<string, string[]>()

  buildLines: LogLine[] = successfulBuildLines
  buildExitCode = 0
  /** Whether a build leaves an image under its tag, whatever its outcome. */
  buildTagsImage = true

  readonly inspected: string[] = []
  readonly pulls: string[] = []
  readonly runs: EphemeralContainerRequest[] = []
  readonly builds: BuildImageRequest[] = []
  readonly removed: string[] = []

  async check(): Promise<void> {/* always available */}

  async inspectImage(reference: string): Promise<ImageInfo | undefined> {
    this.inspected.push(reference)
    return this.images.get(reference)
  }

  async pullImage(reference: string, onLogLine: OnLogLine): Promise<ProcessExit> {
    this.pulls.push(reference)
    const entry = this.registry.get(reference)
    if (!entry) {
      const line = `Error response from daemon: pull access denied for ${reference}`
      onLogLine({stream: 'stderr', line})
      return {exitCode: 1, stderrTail: [line]}
    }

    for (const line of entry.lines) {
      onLogLine(line)
    }

    if (entry.image) {
      this.images.set(reference, entry.image)
    }

    return {exitCode: 0, stderrTail: []}
  }

  async runEphemeral(request: EphemeralContainerRequest, onLogLine: OnLogLine): Promise<ProcessExit> {
    this.runs.push(request)
    if (!this.images.has(request.image)) {
      throw new ImageNotFoundError(request.image)
    }

    const lines = this.osRelease.get(request.image)
    if (!lines) {
      const line = `${request.entrypoint}: ${request.args.join(' ')}: No such file or directory`
      onLogLine({stream: 'stderr', line})
      return {exitCode: 1, stderrTail: [line]}
    }

    for (const line of lines) {
      onLogLine(stdout(line))
    }

    return {exitCode: 0, stderrTail: []}
  }

  async buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<ProcessExit> {
    this.builds.push(request)
    for (const line of this.buildLines) {
      onLogLine(line)
    }

    if (this.buildTagsImage) {
      this.images.set(request.tag, imageInfo(request.tag))
    }

    return {exitCode: this.buildExitCode, stderrTail: []}
  }

  async removeImage(reference: string): Promise<boolean> {
    this.removed.push(reference)
    return this.images.delete(reference)
  }
}

/**
 * Validation client answering every request with the same result.
 */
export function stubValidationClient(
  result: Result<RemoteVerdict, RequestFailedError> = ok({valid: true, errors: []})
): ManifestValidationClient & {received: Manifest[]} {
  const received: Manifest[] = []
  return {
    received,
    async validate(manifest) {
      received.push(manifest)
      return result
    }
  }
}

/** The annotated sample configuration shipped in templates/. */
export async function readSampleConfig(): Promise<string> {
  return readFile(join(templatesDir, 'config.yaml'), 'utf8')
}

/** The sample configuration, validated. */
export async function sampleConfig(): Promise<PackagingConfig> {
  const result = validateConfig(parseYaml(await readSampleConfig()))
  if (!result.ok) {
    throw result.error
  }

  return result.value
}

export async function writeConfigFile(dir: string, content: string): Promise<string> {
  const filePath = join(dir, 'config.yaml')
  await writeFile(filePath, content, 'utf8')
  return filePath
}

/**
 * Checks if Docker is available on the host (synchronous for use at module level).
 */
export function isDockerAvailable(): boolean {
  try {
    execSync('docker version', {stdio: 'ignore'})
    return true
  } catch {
    return false
  }
}
