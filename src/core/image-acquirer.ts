import {ImageNotFoundError, ImagePullError} from '../errors.js'
import type {ImageEngine, ImageInfo} from '../engine/index.js'
import {err, ok, type Result} from '../result.js'
import type {Reporter} from './reporter.js'
import {PullProgressWorker} from './pull-progress.js'
import {errorMessage} from './utils.js'

/**
 * Makes sure a base image is in the local store, pulling it when absent.
 */
export class ImageAcquirer {
  constructor(
    private readonly engine: ImageEngine,
    private readonly reporter: Reporter
  ) {}

  async ensurePresent(reference: string): Promise<Result<ImageInfo>> {
    const local = await this.inspect(reference)
    if (!local.ok) {
      return local
    }

    if (local.value) {
      this.detail(`Image ${reference} is already downloaded (${local.value.id})`)
      return ok(local.value)
    }

    this.detail(`Image ${reference} does not seem to be downloaded, pulling it`)
    const pulled = await this.pull(reference)
    if (!pulled.ok) {
      return pulled
    }

    const resolved = await this.inspect(reference)
    if (!resolved.ok) {
      return resolved
    }

    if (!resolved.value) {
      return err(new ImageNotFoundError(reference))
    }

    this.detail(`Image ${reference} pulled as ${resolved.value.id} (${pulled.value.progress.completed} layers)`)
    return ok(resolved.value)
  }

  private async inspect(reference: string): Promise<Result<ImageInfo | undefined>> {
    try {
      return ok(await this.engine.inspectImage(reference))
    } catch (error: unknown) {
      return err(new ImagePullError(reference, errorMessage(error), {cause: error}))
    }
  }

  private async pull(reference: string): Promise<Result<PullProgressWorker>> {
    const worker = new PullProgressWorker(reference, this.reporter)
    try {
      const exit = await this.engine.pullImage(reference, line => {
        worker.observe(line)
      })

      if (exit.exitCode !== 0) {
        const detail = exit.stderrTail.join('\n') || `docker pull exited with code ${exit.exitCode}`
        return err(new ImagePullError(reference, detail))
      }
    } catch (error: unknown) {
      return err(new ImagePullError(reference, errorMessage(error), {cause: error}))
    }

    return ok(worker)
  }

  private detail(message: string): void {
    this.reporter.emit({event: 'STAGE_DETAIL', stage: 'acquire-image', message})
  }
}
