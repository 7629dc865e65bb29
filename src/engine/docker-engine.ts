import process from 'node:process'
import {execa} from 'execa'
import {EngineFaultError, ImageNotFoundError} from '../errors.js'
import {imageInspectSchema} from '../core/schemas.js'
import type {BuildImageRequest, EphemeralContainerRequest, ImageInfo, ProcessExit} from './types.js'
import {ImageEngine, type OnLogLine} from './engine.js'

const stderrTailSize = 20
const noSuchImage = /no such image|unable to find image/i

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept: host secrets (API keys, tokens,
 * credentials) never reach the engine or a build.
 */
export function dockerCliEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/**
 * Arguments of `docker build`. Build args are passed as separate argv entries,
 * so values such as the serialized manifest need no shell quoting.
 */
export function dockerBuildArgs(request: BuildImageRequest): string[] {
  const args = ['build', '--rm', '--tag', request.tag]
  for (const [key, value] of Object.entries(request.buildArgs)) {
    args.push('--build-arg', `${key}=${value}`)
  }

  args.push(request.contextDir)
  return args
}

/**
 * Parse the output of `docker image inspect --format '{{json .}}'`.
 */
export function parseImageInspect(stdout: string): ImageInfo {
  const parsed = imageInspectSchema.safeParse(JSON.parse(stdout))
  if (!parsed.success) {
    throw new EngineFaultError(`Unexpected image inspect output: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`)
  }

  const {Id, Config} = parsed.data
  return {
    id: Id,
    config: {
      cmd: Config.Cmd,
      entrypoint: Config.Entrypoint,
      workingDir: Config.WorkingDir
    }
  }
}

function describeFailure(binary: string, command: string, result: {exitCode?: number; stderr: string}): string {
  const stderr = result.stderr.trim()
  if (stderr) {
    return stderr
  }

  return result.exitCode === undefined
    ? `${binary} ${command} could not be started`
    : `${binary} ${command} exited with code ${result.exitCode}`
}

export class DockerCliEngine extends ImageEngine {
  private readonly env: Record<string, string>

  constructor(private readonly binary = 'docker', env: Record<string, string> = dockerCliEnv()) {
    super()
    this.env = env
  }

  async check(): Promise<void> {
    try {
      await execa(this.binary, ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new EngineFaultError('Docker CLI not found. Please install Docker.', {cause: error})
    }
  }

  async inspectImage(reference: string): Promise<ImageInfo | undefined> {
    const result = await execa(this.binary, ['image', 'inspect', '--format', '{{json .}}', reference], {
      env: this.env,
      extendEnv: false,
      reject: false
    })

    if (result.exitCode === 0) {
      return parseImageInspect(result.stdout)
    }

    if (noSuchImage.test(result.stderr)) {
      return undefined
    }

    throw new EngineFaultError(describeFailure(this.binary, 'image inspect', result))
  }

  async pullImage(reference: string, onLogLine: OnLogLine): Promise<ProcessExit> {
    return this.runStreamed(['pull', reference], onLogLine)
  }

  /**
   * Single-phase execution: docker create + docker start -a, then docker rm.
   */
  async runEphemeral(request: EphemeralContainerRequest, onLogLine: OnLogLine): Promise<ProcessExit> {
    const created = await execa(this.binary, [
      'create',
      '--name',
      request.name,
      '--pull',
      'never',
      '--entrypoint',
      request.entrypoint,
      request.image,
      ...request.args
    ], {env: this.env, extendEnv: false, reject: false})

    if (created.exitCode !== 0) {
      if (noSuchImage.test(created.stderr)) {
        throw new ImageNotFoundError(request.image)
      }

      throw new EngineFaultError(describeFailure(this.binary, 'create', created))
    }

    try {
      return await this.runStreamed(['start', '--attach', request.name], onLogLine)
    } finally {
      await this.removeContainer(request.name)
    }
  }

  async buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<ProcessExit> {
    // The classic builder prints the "Successfully built <id>" line the
    // build verdict relies on; BuildKit does not.
    return this.runStreamed(dockerBuildArgs(request), onLogLine, {DOCKER_BUILDKIT: '0'})
  }

  async removeImage(reference: string): Promise<boolean> {
    const result = await execa(this.binary, ['image', 'rm', reference], {
      env: this.env,
      extendEnv: false,
      reject: false
    })

    if (result.exitCode === 0) {
      return true
    }

    if (noSuchImage.test(result.stderr)) {
      return false
    }

    throw new EngineFaultError(describeFailure(this.binary, 'image rm', result))
  }

  /**
   * Run a docker command, handing its output to `onLogLine` line by line.
   * Resolves once the process has exited and both streams are drained.
   */
  private async runStreamed(
    args: string[],
    onLogLine: OnLogLine,
    extraEnv?: Record<string, string>
  ): Promise<ProcessExit> {
    const stderrTail: string[] = []
    const proc = execa(this.binary, args, {
      env: {...this.env, ...extraEnv},
      extendEnv: false,
      reject: false
    })

    await this.streamLogs(proc, log => {
      if (log.stream === 'stderr') {
        stderrTail.push(log.line)
        if (stderrTail.length > stderrTailSize) {
          stderrTail.shift()
        }
      }

      onLogLine(log)
    })

    const result = await proc
    if (result.exitCode === undefined) {
      throw new EngineFaultError(describeFailure(this.binary, args[0] ?? '', result))
    }

    return {exitCode: result.exitCode, stderrTail}
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables.
   */
  private async streamLogs(
    proc: ReturnType<typeof execa>,
    onLogLine: OnLogLine
  ): Promise<void> {
    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
  }

  /**
   * Force-remove a container. Never throws: a leftover container is not
   * worth failing the run for.
   */
  private async removeContainer(name: string): Promise<void> {
    await execa(this.binary, ['rm', '-f', '-v', name], {env: this.env, extendEnv: false, reject: false})
  }
}
