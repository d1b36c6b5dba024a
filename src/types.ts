// ---------------------------------------------------------------------------
// Shared domain types.
//
// Parser definitions come from the bundled catalog and the project config;
// steps and pipelines are produced by the command builder and consumed by the
// job runner.
// ---------------------------------------------------------------------------

// -- Parser definitions ------------------------------------------------------

/** How to fetch and build one parser. */
export type InstallInfo = {
  /** Remote repository URL, or a path to a local checkout. */
  url: string;
  /** C/C++ sources to compile, relative to the build location. */
  files: string[];
  /** Pinned revision. Takes precedence over the lockfile. */
  revision?: string;
  /** Ref to fetch when no revision is pinned anywhere. */
  branch?: string;
  /** Subdirectory of the source holding the grammar. */
  location?: string;
  /** The shipped parser.c is unusable; always run `tree-sitter generate`. */
  requiresGenerateFromGrammar?: boolean;
  /** `npm install` must run before generating. */
  generateRequiresNpm?: boolean;
}

export type ParserDefinition = {
  installInfo: InstallInfo;
  /** 1-based index into the catalog tiers. */
  tier?: number;
  maintainers?: string[];
  readmeNote?: string;
}

export type Catalog = {
  tiers: string[];
  parsers: Record<string, ParserDefinition>;
}

// -- Steps -------------------------------------------------------------------

/** External command, run as a subprocess. Success is exit code 0. */
export type ShellStep = {
  kind: 'shell';
  command: string;
  args: string[];
  cwd?: string;
  /** Progress message shown when the step starts. */
  info?: string;
  /** Message reported when the step fails. */
  error?: string;
}

/** In-process work. Throwing marks the step as failed. */
export type ActionStep = {
  kind: 'action';
  action: () => void;
  info?: string;
  error?: string;
}

export type Step = ShellStep | ActionStep

/** Ordered steps building (or removing) one target. */
export type Pipeline = {
  target: string;
  steps: Step[];
  successMessage: string;
}

export function isShellStep(step: Step): step is ShellStep {
  return step.kind === 'shell'
}

// -- Configuration -----------------------------------------------------------

/**
 * Project-level configuration (`.parsnip.yml`).
 */
export type ParsnipConfig = {
  installDir?: string;
  cacheDir?: string;
  /** Targets skipped by `--exclude-ignored` and by a full update. */
  ignore?: string[];
  /** Replaces the default compiler fallback list (`CC` still comes first). */
  compilers?: string[];
  /** Always fetch with git, even where a tarball is available. */
  preferGit?: boolean;
  /** ABI passed to `tree-sitter generate`. */
  abiVersion?: number;
  /** Extra arguments appended to every invocation of a tool, keyed by command. */
  commandExtraArgs?: Record<string, string[]>;
  lockfile?: string;
  parsers?: Record<string, ParserDefinition>;
}
