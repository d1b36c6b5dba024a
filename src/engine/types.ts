/**
 * Request to run one external command.
 */
export type ProcessRequest = {
  /** Executable name or absolute path */
  command: string;
  /** Arguments passed verbatim (no shell interpretation) */
  args: string[];
  /** Working directory (defaults to the current directory) */
  cwd?: string;
}

/**
 * Result of a finished process.
 */
export type ProcessResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Captured standard output */
  stdout: string;
  /** Captured standard error */
  stderr: string;
  /** Set when the process could not be spawned or was killed */
  error?: string;
}
