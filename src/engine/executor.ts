import type {ProcessRequest, ProcessResult} from './types.js'

/**
 * Log line from a running process.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving output while a process runs.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running external tools.
 *
 * Implementations:
 * - `ExecaProcessExecutor`: spawns real processes through execa
 * - Test doubles that replay scripted results
 *
 * Both modes report the exit code and the full captured output; neither
 * throws for a non-zero exit or an executable that cannot be spawned.
 */
export abstract class ProcessExecutor {
  /**
   * Spawns the process without blocking.
   * @param request - Command, arguments and working directory
   * @param onLogLine - Called for every stdout/stderr line as it arrives
   * @returns Resolves once the process has exited
   */
  abstract run(request: ProcessRequest, onLogLine: OnLogLine): Promise<ProcessResult>

  /**
   * Runs the process to completion, blocking the event loop.
   */
  abstract runSync(request: ProcessRequest): ProcessResult
}
