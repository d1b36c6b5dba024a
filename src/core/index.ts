export {JobRunner, PipelineJob, renderStep, type JobResult, type JobState, type StepOutcome} from './job-runner.js'
export {CommandBuilder, defaultAbiVersion, type BuildContext, type CommandBuilderOptions} from './command-builder.js'
export {RevisionResolver, readLockfile, defaultLockfilePath, type Lockfile, type LockfileEntry} from './revision.js'
export {ProgressTracker, type JobOutput, type ProgressSnapshot} from './progress.js'
export {Installer, allTargets, type BatchResult, type InstallOptions, type InstallerDependencies, type ParserStatus, type Prompt} from './installer.js'
export {ParserRegistry, defaultCatalogPath} from './registry.js'
export {InstallLayout, defaultQueriesSource} from './layout.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  BatchAction,
  InstallEvent,
  BatchStartEvent,
  StepInfoEvent,
  StepLogEvent,
  TargetFinishedEvent,
  TargetFailedEvent,
  TargetSkippedEvent,
  TargetErrorEvent,
  NoticeEvent,
  BatchFinishedEvent
} from './reporter.js'
export {formatDuration, statusPrefix} from './utils.js'
