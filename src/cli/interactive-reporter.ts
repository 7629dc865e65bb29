import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {
  LayerPulledEvent,
  LogSource,
  PackagingEvent,
  PackagingFinishedEvent,
  Reporter,
  Stage,
  StageFailedEvent
} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

const stageLabels: Record<Stage, string> = {
  'parse-config': 'Parse configuration file',
  'validate-config': 'Validate configuration',
  'acquire-image': 'Acquire base image',
  'probe-os': 'Detect base image operating system',
  'create-output-dir': 'Create output directory',
  'build-manifest': 'Build and validate manifest',
  'materialize-templates': 'Copy build templates',
  'build-image': 'Build block image'
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxLogLines() {
    return 20
  }

  private readonly verbose: boolean
  private spinner?: Ora
  private currentStage?: Stage
  private readonly recentLines: string[] = []

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: PackagingEvent): void {
    switch (event.event) {
      case 'PACKAGING_START': {
        console.log(chalk.bold(`\n▶ Packaging: ${chalk.cyan(event.configFile)} → ${chalk.cyan(event.destination)}\n`))
        break
      }

      case 'STAGE_STARTING': {
        this.currentStage = event.stage
        this.recentLines.length = 0
        this.spinner = ora({text: stageLabels[event.stage], prefixText: ' '}).start()
        break
      }

      case 'STAGE_DETAIL': {
        if (this.verbose) {
          this.print(chalk.gray(`  ${event.message}`))
        }

        break
      }

      case 'LAYER_PULLED': {
        this.handleLayerPulled(event)
        break
      }

      case 'STAGE_FINISHED': {
        this.spinner?.stopAndPersist({
          symbol: chalk.green('✓'),
          text: chalk.green(`${stageLabels[event.stage]} (${formatDuration(event.durationMs)})`)
        })
        this.spinner = undefined
        break
      }

      case 'STAGE_FAILED': {
        this.handleStageFailed(event)
        break
      }

      case 'PACKAGING_FINISHED': {
        this.handlePackagingFinished(event)
        break
      }

      case 'PACKAGING_FAILED': {
        console.log(chalk.bold.red('\n✗ Packaging failed\n'))
        break
      }
    }
  }

  log(source: LogSource, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const prefix = chalk.gray(`  [${source}]`)
      this.print(`${prefix} ${stream === 'stderr' ? chalk.yellow(line) : line}`)
    }

    this.recentLines.push(line)
    if (this.recentLines.length > InteractiveReporter.maxLogLines) {
      this.recentLines.shift()
    }
  }

  private handleLayerPulled(event: LayerPulledEvent): void {
    if (this.spinner && this.currentStage) {
      this.spinner.text = `${stageLabels[this.currentStage]} (${event.completed}/${event.total} layers)`
    }
  }

  private handleStageFailed(event: StageFailedEvent): void {
    this.spinner?.stopAndPersist({
      symbol: chalk.red('✗'),
      text: chalk.red(stageLabels[event.stage])
    })
    this.spinner = undefined

    console.log(chalk.red(`  ${event.kind}: ${event.message}`))
    if (!this.verbose && this.recentLines.length > 0) {
      console.log(chalk.red('  ── last log lines ──'))
      for (const line of this.recentLines) {
        console.log(chalk.red(`  ${line}`))
      }
    }
  }

  private handlePackagingFinished(event: PackagingFinishedEvent): void {
    console.log(chalk.bold.green(`\n✓ Packaged ${chalk.cyan(event.tag)} (${event.distribution}, ${formatDuration(event.durationMs)})`))
    console.log(chalk.gray(`  Build files in ${event.destination}\n`))
  }

  private print(text: string): void {
    if (this.spinner) {
      this.spinner.clear()
      console.log(text)
      this.spinner.render()
    } else {
      console.log(text)
    }
  }
}
