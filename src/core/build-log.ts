import type {LogLine} from '../engine/index.js'
import type {Reporter} from './reporter.js'

/** Line the classic builder prints once the image exists. */
export const buildSuccessMarker = 'Successfully built'

/**
 * Consumes the output of one image build and derives its verdict.
 *
 * The verdict comes from the log content only: a build whose output holds the
 * success marker succeeded, whatever else was printed before or after it and
 * whatever the process exit status was.
 */
export class BuildLogWorker {
  private sawMarker = false

  constructor(private readonly reporter: Reporter) {}

  get succeeded(): boolean {
    return this.sawMarker
  }

  observe({stream, line}: LogLine): void {
    const text = line.replaceAll('\n', '')
    if (text) {
      this.reporter.log('build', stream, text)
    }

    if (text.includes(buildSuccessMarker)) {
      this.sawMarker = true
    }
  }
}
