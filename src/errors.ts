export class ParsnipError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ParsnipError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigurationError extends ParsnipError {
  constructor(message: string, options?: {cause?: unknown; code?: string}) {
    super(options?.code ?? 'CONFIGURATION_ERROR', message, options)
    this.name = 'ConfigurationError'
  }
}

export class UnknownTargetError extends ConfigurationError {
  constructor(readonly target: string, options?: {cause?: unknown}) {
    super(`Parser not available for language "${target}"`, {...options, code: 'UNKNOWN_TARGET'})
    this.name = 'UnknownTargetError'
  }
}

// -- Tool errors -------------------------------------------------------------

export class ToolMissingError extends ParsnipError {
  constructor(
    readonly tool: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('TOOL_MISSING', message, options)
    this.name = 'ToolMissingError'
  }
}

// -- Pipeline errors ---------------------------------------------------------

export class StepFailureError extends ParsnipError {
  constructor(
    readonly target: string,
    readonly stepIndex: number,
    stepMessage: string,
    readonly output: {stdout: string; stderr: string} = {stdout: '', stderr: ''},
    options?: {cause?: unknown}
  ) {
    super('STEP_FAILURE', output.stderr ? `${stepMessage}\n${output.stderr}` : stepMessage, options)
    this.name = 'StepFailureError'
  }
}

export class UnrecognizedTargetError extends ParsnipError {
  constructor(readonly target: string, options?: {cause?: unknown}) {
    super('UNRECOGNIZED_TARGET', `Parser for ${target} is not managed by parsnip`, options)
    this.name = 'UnrecognizedTargetError'
  }
}

export class ProgressError extends ParsnipError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('PROGRESS_INVARIANT', message, options)
    this.name = 'ProgressError'
  }
}
