import {ContainerFaultError, EngineFaultError, UnsupportedDistributionError} from '../errors.js'
import type {ImageEngine} from '../engine/index.js'
import {attempt, err, ok, type Result} from '../result.js'
import {isDistribution, type Distribution} from '../types.js'
import type {Reporter} from './reporter.js'
import {errorMessage} from './utils.js'

export const osReleasePath = '/etc/os-release'

const idLine = /^ID=("?)([^"]*)\1$/

/**
 * Find the distribution in the lines of an os-release file.
 *
 * The first `ID=` line decides (`ID=debian` or `ID="centos"`). An
 * identifier outside the supported set is a hard stop, not a reason to keep
 * scanning.
 */
export function parseDistribution(lines: Iterable<string>): Result<Distribution, UnsupportedDistributionError> {
  for (const line of lines) {
    const match = idLine.exec(line.trim())
    if (!match) {
      continue
    }

    const id = match[2] ?? ''
    return isDistribution(id) ? ok(id) : err(new UnsupportedDistributionError(id || undefined))
  }

  return err(new UnsupportedDistributionError(undefined))
}

/**
 * Classifies a base image by running it once and reading its os-release file.
 */
export class OsProber {
  constructor(
    private readonly engine: ImageEngine,
    private readonly reporter: Reporter,
    private readonly containerName: () => string = () => `blockpack-os-probe-${Date.now()}`
  ) {}

  async classify(reference: string): Promise<Result<Distribution>> {
    const output: string[] = []
    const run = await attempt(
      async () => this.engine.runEphemeral(
        {name: this.containerName(), image: reference, entrypoint: 'cat', args: [osReleasePath]},
        ({stream, line}) => {
          this.reporter.log('probe', stream, line)
          if (stream === 'stdout') {
            output.push(line)
          }
        }
      ),
      error => new EngineFaultError(`The image engine returned an error: ${errorMessage(error)}`, {cause: error})
    )

    if (!run.ok) {
      return run
    }

    if (run.value.exitCode !== 0) {
      return err(new ContainerFaultError(run.value.exitCode, run.value.stderrTail.join('\n') || `cat ${osReleasePath} failed`))
    }

    const distribution = parseDistribution(output)
    if (distribution.ok) {
      this.reporter.emit({event: 'STAGE_DETAIL', stage: 'probe-os', message: `Image is based on: ${distribution.value}`})
    }

    return distribution
  }
}
