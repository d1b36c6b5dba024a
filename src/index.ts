/**
 * Programmatic API.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {
 *   CommandBuilder, ConsoleReporter, ExecaProcessExecutor, Installer, InstallLayout,
 *   JobRunner, ParserRegistry, ProgressTracker, RevisionResolver, defaultLockfilePath
 * } from 'parsnip'
 *
 * const registry = await ParserRegistry.load()
 * const layout = new InstallLayout('/opt/parsers')
 * const progress = new ProgressTracker()
 * const reporter = new ConsoleReporter()
 *
 * const installer = new Installer({
 *   registry,
 *   layout,
 *   resolver: new RevisionResolver(t => registry.installInfo(t), defaultLockfilePath, layout.infoDir),
 *   builder: new CommandBuilder(),
 *   runner: new JobRunner(new ExecaProcessExecutor(), progress, reporter),
 *   progress,
 *   reporter,
 *   prompt: {confirm: async () => false},
 *   cacheDir: '/tmp/parsnip'
 * })
 *
 * const {failed} = await installer.install(['json', 'python'])
 * ```
 */

export {
  ProcessExecutor,
  ExecaProcessExecutor,
  type LogLine,
  type OnLogLine,
  type ProcessRequest,
  type ProcessResult
} from './engine/index.js'

export {
  findExecutable,
  selectExecutable,
  selectDownloadSteps,
  selectCompileStep,
  defaultCompilers,
  type ToolLocator,
  type DownloadOptions
} from './tools/index.js'

export * from './core/index.js'

export {
  ParsnipError,
  ConfigurationError,
  UnknownTargetError,
  ToolMissingError,
  StepFailureError,
  UnrecognizedTargetError,
  ProgressError
} from './errors.js'

export {
  isShellStep,
  type InstallInfo,
  type ParserDefinition,
  type Catalog,
  type ShellStep,
  type ActionStep,
  type Step,
  type Pipeline,
  type ParsnipConfig
} from './types.js'
