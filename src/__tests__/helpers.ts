import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {InstallEvent, Reporter} from '../core/reporter.js'
import {ProcessExecutor, type OnLogLine} from '../engine/executor.js'
import type {ProcessRequest, ProcessResult} from '../engine/types.js'
import type {ToolLocator} from '../tools/locate.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'parsnip-test-'))
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records every event for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: InstallEvent[]} {
  const events: InstallEvent[] = []
  const reporter: Reporter = {
    emit(event: InstallEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * Locator that only knows the given tools, each at `/usr/bin/<name>`.
 */
export function fakeLocator(...available: string[]): ToolLocator {
  return name => available.includes(name) ? `/usr/bin/${name}` : undefined
}

export type ScriptedResult = Partial<ProcessResult> & {
  /** Lines reported through onLogLine before the result is returned. */
  lines?: Array<{stream: 'stdout' | 'stderr'; line: string}>;
}

/**
 * Executor that spawns nothing. Every request is recorded; the answer is
 * taken from `script` (matched on the command's base name) and defaults to
 * a successful run with no output.
 */
export class FakeExecutor extends ProcessExecutor {
  readonly requests: ProcessRequest[] = []

  constructor(private readonly script: (request: ProcessRequest) => ScriptedResult | undefined = () => undefined) {
    super()
  }

  async run(request: ProcessRequest, onLogLine: OnLogLine): Promise<ProcessResult> {
    const scripted = this.answer(request)
    for (const line of scripted.lines ?? []) {
      onLogLine(line)
    }

    return toResult(scripted)
  }

  runSync(request: ProcessRequest): ProcessResult {
    const scripted = this.answer(request)
    const result = toResult(scripted)
    const stdout = scripted.lines?.filter(l => l.stream === 'stdout').map(l => l.line) ?? []
    const stderr = scripted.lines?.filter(l => l.stream === 'stderr').map(l => l.line) ?? []
    return {
      ...result,
      stdout: scripted.stdout ?? stdout.join('\n'),
      stderr: scripted.stderr ?? stderr.join('\n')
    }
  }

  private answer(request: ProcessRequest): ScriptedResult {
    this.requests.push(request)
    return this.script(request) ?? {}
  }
}

function toResult(scripted: ScriptedResult): ProcessResult {
  return {
    exitCode: scripted.exitCode ?? 0,
    stdout: scripted.stdout ?? '',
    stderr: scripted.stderr ?? '',
    error: scripted.error
  }
}
