import pino from 'pino'

export type BatchAction = 'install' | 'update' | 'uninstall'

/**
 * Discriminated union of install events.
 *
 * Lifecycle:
 * 1. BATCH_START - Targets of a batch are known
 * 2. For each target:
 *    a. TARGET_SKIPPED - Declined at the reinstall prompt
 *       OR TARGET_ERROR - Rejected before any step ran (config, missing tool, not installed)
 *    b. STEP_INFO - A step with a progress message starts
 *    c. STEP_LOG - Process output line
 *    d. TARGET_FINISHED - Every step succeeded
 *       OR TARGET_FAILED - A step failed, remaining steps were not run
 * 3. NOTICE - Batch-level message (e.g. nothing to update)
 * 4. BATCH_FINISHED - Every pipeline of the batch has completed
 *
 * `status` carries the progress tracker rendering at the time of the event.
 */
export type BatchStartEvent = {
  event: 'BATCH_START';
  action: BatchAction;
  targets: string[];
}

export type StepInfoEvent = {
  event: 'STEP_INFO';
  target: string;
  message: string;
  status: string;
}

export type StepLogEvent = {
  event: 'STEP_LOG';
  target: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type TargetFinishedEvent = {
  event: 'TARGET_FINISHED';
  target: string;
  message: string;
  status: string;
}

export type TargetFailedEvent = {
  event: 'TARGET_FAILED';
  target: string;
  /** Step error message, or a rendering of the failing command */
  message: string;
  stdout: string;
  stderr: string;
  status: string;
}

export type TargetSkippedEvent = {
  event: 'TARGET_SKIPPED';
  target: string;
  reason: 'declined';
}

export type TargetErrorEvent = {
  event: 'TARGET_ERROR';
  target: string;
  code: string;
  message: string;
}

export type NoticeEvent = {
  event: 'NOTICE';
  message: string;
}

export type BatchFinishedEvent = {
  event: 'BATCH_FINISHED';
  action: BatchAction;
  status: string;
}

export type InstallEvent =
  | BatchStartEvent
  | StepInfoEvent
  | StepLogEvent
  | TargetFinishedEvent
  | TargetFailedEvent
  | TargetSkippedEvent
  | TargetErrorEvent
  | NoticeEvent
  | BatchFinishedEvent

/**
 * Interface for reporting install events.
 */
export type Reporter = {
  emit(event: InstallEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: InstallEvent): void {
    switch (event.event) {
      case 'TARGET_FAILED':
      case 'TARGET_ERROR': {
        this.logger.error(event)
        break
      }

      case 'STEP_LOG': {
        this.logger.debug(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
