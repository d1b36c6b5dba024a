import {execa, execaSync} from 'execa'
import type {ProcessRequest, ProcessResult} from './types.js'
import {ProcessExecutor, type OnLogLine} from './executor.js'

function describe(request: ProcessRequest): string {
  return [request.command, ...request.args].join(' ')
}

export class ExecaProcessExecutor extends ProcessExecutor {
  async run(request: ProcessRequest, onLogLine: OnLogLine): Promise<ProcessResult> {
    const stdout: string[] = []
    const stderr: string[] = []

    try {
      const proc = execa(request.command, request.args, {
        cwd: request.cwd,
        reject: false
      })

      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          stdout.push(line)
          onLogLine({stream: 'stdout', line})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          stderr.push(line)
          onLogLine({stream: 'stderr', line})
        }
      })()

      const [result] = await Promise.all([proc, stdoutDone, stderrDone])

      if (result.exitCode === undefined) {
        return {exitCode: 1, stdout: stdout.join('\n'), stderr: stderr.join('\n'), error: `Failed to run ${describe(request)}`}
      }

      return {exitCode: result.exitCode, stdout: stdout.join('\n'), stderr: stderr.join('\n')}
    } catch (error) {
      return {
        exitCode: 1,
        stdout: stdout.join('\n'),
        stderr: stderr.join('\n'),
        error: error instanceof Error ? error.message : String(error)
      }
    }
  }

  runSync(request: ProcessRequest): ProcessResult {
    const result = execaSync(request.command, request.args, {
      cwd: request.cwd,
      reject: false
    })

    const stdout = typeof result.stdout === 'string' ? result.stdout : ''
    const stderr = typeof result.stderr === 'string' ? result.stderr : ''
    if (result.exitCode === undefined) {
      return {exitCode: 1, stdout, stderr, error: `Failed to run ${describe(request)}`}
    }

    return {exitCode: result.exitCode, stdout, stderr}
  }
}
