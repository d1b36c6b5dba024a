import {randomUUID} from 'node:crypto'
import {ProgressError} from '../errors.js'

/**
 * Captured output of one in-flight process, keyed by a per-spawn id.
 */
export type JobOutput = {
  key: string;
  stdout: string[];
  stderr: string[];
}

export type ProgressSnapshot = {
  started: number;
  finished: number;
  failed: number;
}

/**
 * Process-wide pipeline counters shared by every job of a batch.
 *
 * Invariants: `0 <= finished <= started` and `0 <= failed <= finished`.
 * Counters only move through `recordStart`, `recordFinish` and
 * `recordFailure`, which the job runner calls on pipeline transitions.
 * `reset()` is a no-op while any pipeline is in flight, so starting a new
 * batch never zeroes the accounting of one still running.
 */
export class ProgressTracker {
  private started = 0
  private finished = 0
  private failed = 0
  private readonly outputs = new Map<string, JobOutput>()

  get isIdle(): boolean {
    return this.started === this.finished
  }

  recordStart(): void {
    this.started++
  }

  recordFinish(): void {
    if (this.finished >= this.started) {
      throw new ProgressError(`Cannot finish a pipeline that was never started (${this.status()})`)
    }

    this.finished++
  }

  /** Marks a pipeline as finished and failed. */
  recordFailure(): void {
    this.recordFinish()
    this.failed++
  }

  /**
   * Zeroes the counters and drops buffered output.
   * @returns false when pipelines are still running and nothing changed
   */
  reset(): boolean {
    if (!this.isIdle) {
      return false
    }

    this.started = 0
    this.finished = 0
    this.failed = 0
    this.outputs.clear()
    return true
  }

  /** Renders `finished/started`, plus the failure count when there is one. */
  status(): string {
    const base = `${this.finished}/${this.started}`
    return this.failed > 0 ? `${base}, failed: ${this.failed}` : base
  }

  snapshot(): ProgressSnapshot {
    return {started: this.started, finished: this.finished, failed: this.failed}
  }

  openOutput(): JobOutput {
    const output: JobOutput = {key: randomUUID(), stdout: [], stderr: []}
    this.outputs.set(output.key, output)
    return output
  }

  closeOutput(key: string): void {
    this.outputs.delete(key)
  }

  get openOutputs(): number {
    return this.outputs.size
  }
}
