import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BuildEvent, BuildFinishedEvent, Reporter, StageFailedEvent, StageFinishedEvent, StageRef} from '../core/reporter.js'
import {formatDuration, formatSize} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual builds.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly stageSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        console.error(chalk.bold(`\n▶ Bundle: ${chalk.cyan(event.playbookFile)}\n`))
        break
      }

      case 'STAGE_STARTING': {
        const spinner = ora({text: event.stage.displayName, prefixText: '  '}).start()
        this.stageSpinners.set(event.stage.id, spinner)
        break
      }

      case 'STAGE_FINISHED': {
        this.handleStageFinished(event)
        break
      }

      case 'STAGE_SKIPPED': {
        const spinner = this.stageSpinners.get(event.stage.id)
        const text = chalk.gray(`${event.stage.displayName} (${event.reason})`)
        if (spinner) {
          spinner.stopAndPersist({symbol: chalk.gray('⊙'), text})
          this.stageSpinners.delete(event.stage.id)
        } else {
          console.error(`  ${chalk.gray('⊙')} ${text}`)
        }

        break
      }

      case 'STAGE_FAILED': {
        this.handleStageFailed(event)
        break
      }

      case 'CONTENT_COPIED': {
        if (this.verbose) {
          this.printDetail(event.stage, `${event.source} → ${event.target}`)
        }

        break
      }

      case 'METADATA_STRIPPED': {
        if (this.verbose) {
          this.printDetail(event.stage, `stripped ${event.path}`)
        }

        break
      }

      case 'BUILD_FINISHED': {
        this.handleBuildFinished(event)
        break
      }

      case 'BUILD_FAILED': {
        console.error(chalk.bold.red('\n✗ Build failed\n'))
        break
      }
    }
  }

  log(stage: StageRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      this.printDetail(stage, line)
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(stage.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(stage.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private printDetail(stage: StageRef, text: string): void {
    const spinner = this.stageSpinners.get(stage.id)
    const prefix = chalk.gray(`  [${stage.id}]`)
    if (spinner) {
      spinner.clear()
      console.error(`${prefix} ${text}`)
      spinner.render()
    } else {
      console.error(`${prefix} ${text}`)
    }
  }

  private handleStageFinished(event: StageFinishedEvent): void {
    const spinner = this.stageSpinners.get(event.stage.id)
    if (spinner) {
      spinner.stopAndPersist({
        symbol: chalk.green('✓'),
        text: chalk.green(`${event.stage.displayName} (${formatDuration(event.durationMs)})`)
      })
      this.stageSpinners.delete(event.stage.id)
    }

    this.stderrBuffers.delete(event.stage.id)
  }

  private handleStageFailed(event: StageFailedEvent): void {
    const spinner = this.stageSpinners.get(event.stage.id)
    if (spinner) {
      const exitInfo = event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`
      spinner.stopAndPersist({
        symbol: chalk.red('✗'),
        text: chalk.red(`${event.stage.displayName}${exitInfo}`)
      })
      this.stageSpinners.delete(event.stage.id)
    }

    const stderr = this.stderrBuffers.get(event.stage.id)
    if (stderr && stderr.length > 0) {
      console.error(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.error(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(event.stage.id)
  }

  private handleBuildFinished(event: BuildFinishedEvent): void {
    console.error(chalk.bold.green(`\n✓ ${event.outputFile} (${formatSize(event.size)}, ${formatDuration(event.durationMs)})`))
    console.error(chalk.gray(`  sha256 ${event.sha256}\n`))
  }
}
