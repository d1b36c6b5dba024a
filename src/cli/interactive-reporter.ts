import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk from 'chalk'
import type {InstallEvent, Reporter, TargetFailedEvent} from '../core/reporter.js'
import {formatDuration, statusPrefix} from '../core/utils.js'

type TargetStatus = 'pending' | 'running' | 'done' | 'skipped' | 'failed'

type TargetDisplayState = {
  status: TargetStatus;
  detail?: string;
}

/**
 * Reporter with a live terminal view: one row per target and the batch
 * progress below. Failures are printed above the view with their captured
 * output.
 */
export class InteractiveReporter implements Reporter {
  private readonly verbose: boolean
  private readonly logUpdate = createLogUpdate(process.stderr)
  private readonly targets = new Map<string, TargetDisplayState>()
  private status = '0/0'
  private startedAt = Date.now()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: InstallEvent): void {
    switch (event.event) {
      case 'BATCH_START': {
        this.targets.clear()
        this.startedAt = Date.now()
        for (const target of event.targets) {
          this.targets.set(target, {status: 'pending'})
        }

        break
      }

      case 'STEP_INFO': {
        this.status = event.status
        this.targets.set(event.target, {status: 'running', detail: event.message})
        break
      }

      case 'STEP_LOG': {
        if (this.verbose) {
          this.print(`${chalk.gray(`  [${event.target}]`)} ${event.line}`)
        }

        return
      }

      case 'TARGET_FINISHED': {
        this.status = event.status
        this.targets.set(event.target, {status: 'done', detail: event.message})
        break
      }

      case 'TARGET_FAILED': {
        this.status = event.status
        this.targets.set(event.target, {status: 'failed'})
        this.printFailure(event)
        break
      }

      case 'TARGET_SKIPPED': {
        this.targets.set(event.target, {status: 'skipped', detail: 'kept existing install'})
        break
      }

      case 'TARGET_ERROR': {
        this.targets.set(event.target, {status: 'failed'})
        this.print(chalk.red(`${event.target}: ${event.message}`))
        break
      }

      case 'NOTICE': {
        this.print(event.message)
        return
      }

      case 'BATCH_FINISHED': {
        this.status = event.status
        this.render()
        this.logUpdate.done()
        console.error(chalk.gray(`${statusPrefix(event.status)} ${event.action} done in ${formatDuration(Date.now() - this.startedAt)}`))
        return
      }
    }

    this.render()
  }

  private printFailure(event: TargetFailedEvent): void {
    if (event.stdout) {
      this.print(event.stdout)
    }

    this.print(chalk.red(`parsnip[${event.target}]: ${event.message}`))
  }

  private print(text: string): void {
    this.logUpdate.clear()
    console.error(text)
    this.render()
  }

  private render(): void {
    const lines: string[] = []
    for (const [target, state] of this.targets) {
      const detail = state.detail ? chalk.gray(` ${state.detail}`) : ''
      lines.push(`  ${symbolFor(state.status)} ${target}${detail}`)
    }

    lines.push(chalk.bold(statusPrefix(this.status)))
    this.logUpdate(lines.join('\n'))
  }
}

function symbolFor(status: TargetStatus): string {
  switch (status) {
    case 'pending': {
      return chalk.gray('○')
    }

    case 'running': {
      return chalk.cyan('●')
    }

    case 'done': {
      return chalk.green('✓')
    }

    case 'skipped': {
      return chalk.gray('⊙')
    }

    case 'failed': {
      return chalk.red('✗')
    }
  }
}
