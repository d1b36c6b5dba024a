import type {ProcessExecutor, ProcessResult} from '../engine/index.js'
import {ParsnipError, StepFailureError} from '../errors.js'
import type {ActionStep, Pipeline, ShellStep, Step} from '../types.js'
import type {JobOutput, ProgressTracker} from './progress.js'
import type {Reporter} from './reporter.js'

export type StepOutcome =
  | {ok: true}
  | {ok: false; stdout: string; stderr: string}

export type JobState = 'pending' | 'running' | 'succeeded' | 'failed'

export type JobResult =
  | {ok: true; target: string}
  | {ok: false; target: string; error: StepFailureError}

export function renderStep(step: Step, index: number): string {
  if (step.kind === 'action') {
    return `<action step ${index + 1}>`
  }

  const command = [step.command, ...step.args].join(' ')
  return step.cwd ? `${command} (in ${step.cwd})` : command
}

/**
 * Cursor over the steps of one pipeline.
 *
 * States: `pending` → `running` → `succeeded` | `failed`. The pipeline is
 * counted as started exactly once, when `start()` leaves `pending`; every
 * step outcome goes through `advance()`, which either moves to the next step
 * or settles the job and records it on the tracker. A failed step ends the
 * job; the steps after it are never returned by `current()`.
 */
export class PipelineJob {
  private index = 0
  private status: JobState = 'pending'
  private failure?: StepFailureError

  constructor(
    readonly pipeline: Pipeline,
    private readonly progress: ProgressTracker
  ) {}

  get state(): JobState {
    return this.status
  }

  get position(): number {
    return this.index
  }

  get error(): StepFailureError | undefined {
    return this.failure
  }

  start(): void {
    if (this.status !== 'pending') {
      throw new ParsnipError('JOB_ALREADY_STARTED', `Pipeline for ${this.pipeline.target} was already started`)
    }

    this.status = 'running'
    this.progress.recordStart()
    this.settleIfComplete()
  }

  /** Step to execute next; undefined once the job has settled. */
  current(): Step | undefined {
    return this.status === 'running' ? this.pipeline.steps[this.index] : undefined
  }

  advance(outcome: StepOutcome): JobState {
    const step = this.current()
    if (!step) {
      throw new ParsnipError('JOB_NOT_RUNNING', `Pipeline for ${this.pipeline.target} is ${this.status}`)
    }

    if (!outcome.ok) {
      this.status = 'failed'
      this.failure = new StepFailureError(
        this.pipeline.target,
        this.index,
        step.error ?? `Failed to execute the following command:\n${renderStep(step, this.index)}`,
        {stdout: outcome.stdout, stderr: outcome.stderr}
      )
      this.progress.recordFailure()
      return this.status
    }

    this.index++
    this.settleIfComplete()
    return this.status
  }

  private settleIfComplete(): void {
    if (this.index === this.pipeline.steps.length) {
      this.status = 'succeeded'
      this.progress.recordFinish()
    }
  }
}

/**
 * Executes pipelines, either blocking (`runSync`) or as a chain of process
 * spawns (`run`).
 *
 * In async mode a pipeline suspends at each shell step until its process
 * exits; several pipelines may have processes in flight at once, but the
 * steps of one pipeline never overlap. Action steps always run inline.
 */
export class JobRunner {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly progress: ProgressTracker,
    private readonly reporter: Reporter
  ) {}

  runSync(pipeline: Pipeline): JobResult {
    const job = new PipelineJob(pipeline, this.progress)
    job.start()

    for (let step = job.current(); step; step = job.current()) {
      this.announce(pipeline.target, step)
      job.advance(step.kind === 'action' ? runAction(step) : this.runShellSync(pipeline.target, step))
    }

    return this.settle(job)
  }

  async run(pipeline: Pipeline): Promise<JobResult> {
    const job = new PipelineJob(pipeline, this.progress)
    job.start()

    for (let step = job.current(); step; step = job.current()) {
      this.announce(pipeline.target, step)
      job.advance(step.kind === 'action' ? runAction(step) : await this.runShell(pipeline.target, step))
    }

    return this.settle(job)
  }

  private announce(target: string, step: Step): void {
    if (step.info) {
      this.reporter.emit({event: 'STEP_INFO', target, message: step.info, status: this.progress.status()})
    }
  }

  private async runShell(target: string, step: ShellStep): Promise<StepOutcome> {
    const output = this.progress.openOutput()
    try {
      const result = await this.executor.run(
        {command: step.command, args: step.args, cwd: step.cwd},
        ({stream, line}) => {
          output[stream].push(line)
          this.reporter.emit({event: 'STEP_LOG', target, stream, line})
        }
      )
      return outcomeOf(result, output)
    } catch (error: unknown) {
      return thrownOutcome(error, output)
    } finally {
      this.progress.closeOutput(output.key)
    }
  }

  private runShellSync(target: string, step: ShellStep): StepOutcome {
    const output = this.progress.openOutput()
    try {
      const result = this.executor.runSync({command: step.command, args: step.args, cwd: step.cwd})
      for (const stream of ['stdout', 'stderr'] as const) {
        for (const line of splitLines(result[stream])) {
          output[stream].push(line)
          this.reporter.emit({event: 'STEP_LOG', target, stream, line})
        }
      }

      return outcomeOf(result, output)
    } catch (error: unknown) {
      return thrownOutcome(error, output)
    } finally {
      this.progress.closeOutput(output.key)
    }
  }

  private settle(job: PipelineJob): JobResult {
    const {target} = job.pipeline
    const status = this.progress.status()

    if (job.error) {
      this.reporter.emit({
        event: 'TARGET_FAILED',
        target,
        message: job.error.message,
        stdout: job.error.output.stdout,
        stderr: job.error.output.stderr,
        status
      })
      return {ok: false, target, error: job.error}
    }

    this.reporter.emit({event: 'TARGET_FINISHED', target, message: job.pipeline.successMessage, status})
    return {ok: true, target}
  }
}

function runAction(step: ActionStep): StepOutcome {
  try {
    step.action()
    return {ok: true}
  } catch (error) {
    return {ok: false, stdout: '', stderr: error instanceof Error ? error.message : String(error)}
  }
}

function outcomeOf(result: ProcessResult, output: JobOutput): StepOutcome {
  if (result.exitCode === 0) {
    return {ok: true}
  }

  const stderr = result.error ? [...output.stderr, result.error] : output.stderr
  return {ok: false, stdout: output.stdout.join('\n'), stderr: stderr.join('\n')}
}

/** A step whose executor or log handling threw fails like a non-zero exit. */
function thrownOutcome(error: unknown, output: JobOutput): StepOutcome {
  const message = error instanceof Error ? error.message : String(error)
  return {ok: false, stdout: output.stdout.join('\n'), stderr: [...output.stderr, message].join('\n')}
}

function splitLines(text: string): string[] {
  return text.length > 0 ? text.split(/\r?\n/) : []
}
