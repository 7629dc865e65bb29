import {layerProgressStates, type LayerProgressState} from '../types.js'
import type {LogLine} from '../engine/index.js'
import type {Reporter} from './reporter.js'

/** Docker status prefixes, matched in this order. */
const statusPrefixes: Array<[prefix: string, state: LayerProgressState]> = [
  ['Pulling fs layer', 'pulling'],
  ['Waiting', 'waiting'],
  ['Downloading', 'downloading'],
  ['Verifying Checksum', 'verifying'],
  ['Download complete', 'download_completed'],
  ['Extracting', 'extracting'],
  ['Pull complete', 'pull_completed']
]

const layerLine = /^([\da-f]{12,64}): (.+)$/

export type LayerStatus = {
  layerId: string;
  state: LayerProgressState;
}

/**
 * Parse a `docker pull` progress line (`<layer-id>: <status>`).
 * Returns undefined for lines that do not describe a layer transition
 * (`Digest: …`, `Status: …`, `Already exists`, …).
 */
export function parsePullLine(line: string): LayerStatus | undefined {
  const match = layerLine.exec(line.trim())
  if (!match) {
    return undefined
  }

  const [, layerId, status] = match
  if (layerId === undefined || status === undefined) {
    return undefined
  }

  for (const [prefix, state] of statusPrefixes) {
    if (status.startsWith(prefix)) {
      return {layerId, state}
    }
  }

  return undefined
}

/**
 * Per-layer progress of one pull. States only move forward: a late
 * `Downloading` for a layer already extracting is ignored.
 */
export class LayerProgressTable {
  private readonly layers = new Map<string, LayerProgressState>()

  /**
   * Records a transition.
   * @returns true when the layer's state changed
   */
  advance(layerId: string, state: LayerProgressState): boolean {
    const current = this.layers.get(layerId)
    if (current !== undefined && rank(state) <= rank(current)) {
      return false
    }

    this.layers.set(layerId, state)
    return true
  }

  get(layerId: string): LayerProgressState | undefined {
    return this.layers.get(layerId)
  }

  get total(): number {
    return this.layers.size
  }

  get completed(): number {
    let count = 0
    for (const state of this.layers.values()) {
      if (state === 'pull_completed') {
        count++
      }
    }

    return count
  }
}

function rank(state: LayerProgressState): number {
  return layerProgressStates.indexOf(state)
}

/**
 * Consumes the output of one `docker pull`. Owns its progress table for the
 * lifetime of the pull; nothing else reads or writes it.
 */
export class PullProgressWorker {
  readonly progress = new LayerProgressTable()

  constructor(
    private readonly image: string,
    private readonly reporter: Reporter
  ) {}

  observe({stream, line}: LogLine): void {
    const status = parsePullLine(line)
    if (!status) {
      if (line.trim()) {
        this.reporter.log('pull', stream, line)
      }

      return
    }

    const changed = this.progress.advance(status.layerId, status.state)
    if (changed && status.state === 'pull_completed') {
      this.reporter.emit({
        event: 'LAYER_PULLED',
        image: this.image,
        layerId: status.layerId,
        completed: this.progress.completed,
        total: this.progress.total
      })
    }
  }
}
