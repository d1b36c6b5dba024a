import process from 'node:process'
import {copyFileSync, mkdirSync, rmSync, statSync, writeFileSync} from 'node:fs'
import {homedir} from 'node:os'
import {dirname, join, resolve} from 'node:path'
import {ToolMissingError} from '../errors.js'
import {defaultCompilers, findExecutable, selectCompileStep, selectDownloadSteps, selectExecutable, type ToolLocator} from '../tools/index.js'
import {isShellStep, type InstallInfo, type Pipeline, type Step} from '../types.js'

/** ABI used by `tree-sitter generate` when nothing else is configured. */
export const defaultAbiVersion = 14

export type CommandBuilderOptions = {
  locate?: ToolLocator;
  /** Fallback compilers tried after `CC` (default: cc, gcc, clang, cl, zig). */
  compilers?: string[];
  /** Resolved at most once per builder. */
  abiVersion?: number | (() => number);
  preferGit?: boolean;
  commandExtraArgs?: Record<string, string[]>;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

export type BuildContext = {
  cacheDir: string;
  /** Destination of the compiled library. */
  libraryPath: string;
  /** Installed marker written as the last build step. */
  markerPath: string;
  /** Revision to record; undefined records an empty marker. */
  revision?: string;
  /** Generate the parser from its grammar even if not required. */
  generateFromSource?: boolean;
}

/**
 * Turns a parser's install info into the ordered steps that build it.
 *
 * ## Step sequence
 *
 * 1. Remote source only: remove any stale checkout, then download
 * 2. Generation requested or required: `npm install` (when the grammar
 *    needs it), then `tree-sitter generate --abi <n>`
 * 3. Compile `parser.so` with the first available C compiler
 * 4. Copy the library into the install location
 * 5. Write the installed marker with the resolved revision
 * 6. Remote source only: remove the checkout
 *
 * Missing tools are detected before any step is produced and reported as
 * `ToolMissingError`; no partial pipeline is returned.
 */
export class CommandBuilder {
  private readonly locate: ToolLocator
  private readonly env: NodeJS.ProcessEnv
  private generateArgs?: string[]

  constructor(private readonly options: CommandBuilderOptions = {}) {
    this.env = options.env ?? process.env
    this.locate = options.locate ?? (name => findExecutable(name, this.env))
  }

  get compilerCandidates(): string[] {
    const fallback = this.options.compilers ?? defaultCompilers
    return [this.env.CC, ...fallback].filter((compiler): compiler is string => typeof compiler === 'string' && compiler.length > 0)
  }

  build(target: string, info: InstallInfo, context: BuildContext): Pipeline {
    const projectName = `tree-sitter-${target}`
    const localPath = this.localSource(info.url)
    const checkoutDir = join(context.cacheDir, projectName)
    const sourceDir = localPath ?? checkoutDir
    const compileLocation = info.location ? join(sourceDir, info.location) : sourceDir

    const generate = info.requiresGenerateFromGrammar === true || context.generateFromSource === true
    const generateSteps = generate ? this.generationSteps(target, info, compileLocation) : []

    const compiler = selectExecutable(this.compilerCandidates, this.locate)
    if (!compiler) {
      throw new ToolMissingError('cc', `No C compiler found! "${this.compilerCandidates.join('", "')}" are not executable.`)
    }

    const steps: Step[] = []
    if (!localPath) {
      steps.push(
        {
          kind: 'action',
          action() {
            mkdirSync(context.cacheDir, {recursive: true})
            rmSync(checkoutDir, {recursive: true, force: true})
          }
        },
        ...selectDownloadSteps({
          projectName,
          url: info.url,
          revision: context.revision,
          branch: info.branch,
          cacheDir: context.cacheDir,
          preferGit: this.options.preferGit,
          locate: this.locate
        })
      )
    }

    steps.push(
      ...generateSteps,
      selectCompileStep(info, compiler, compileLocation, this.options.platform),
      {
        kind: 'action',
        action() {
          mkdirSync(dirname(context.libraryPath), {recursive: true})
          copyFileSync(join(compileLocation, 'parser.so'), context.libraryPath)
        }
      },
      {
        kind: 'action',
        action() {
          mkdirSync(dirname(context.markerPath), {recursive: true})
          writeFileSync(context.markerPath, `${context.revision ?? ''}\n`, 'utf8')
        }
      }
    )

    if (!localPath) {
      steps.push({
        kind: 'action',
        action() {
          rmSync(checkoutDir, {recursive: true, force: true})
        }
      })
    }

    return {
      target,
      steps: steps.map(step => this.withExtraArgs(step)),
      successMessage: `Parser for ${target} has been installed`
    }
  }

  /**
   * Absolute path when `url` names an existing directory, undefined for a
   * remote source.
   */
  private localSource(url: string): string | undefined {
    const home = this.env.HOME ?? homedir()
    const expanded = url === '~' || url.startsWith('~/') ? join(home, url.slice(1)) : url
    const candidate = resolve(expanded)
    try {
      return statSync(candidate).isDirectory() ? candidate : undefined
    } catch {
      return undefined
    }
  }

  private generationSteps(target: string, info: InstallInfo, cwd: string): Step[] {
    const treeSitter = this.locate('tree-sitter')
    if (!treeSitter) {
      const reason = info.requiresGenerateFromGrammar
        ? `\ntree-sitter CLI is needed because \`${target}\` is marked that it needs to be generated from the grammar definitions to be compatible`
        : ''
      throw new ToolMissingError('tree-sitter', `tree-sitter CLI not found: \`tree-sitter\` is not executable!${reason}`)
    }

    if (!this.locate('node')) {
      throw new ToolMissingError('node', 'Node JS not found: `node` is not executable!')
    }

    const steps: Step[] = []
    if (info.generateRequiresNpm) {
      if (!this.locate('npm')) {
        throw new ToolMissingError('npm', `\`${target}\` requires NPM to be installed from grammar.js`)
      }

      steps.push({
        kind: 'shell',
        command: 'npm',
        args: ['install'],
        cwd,
        info: `Installing NPM dependencies of ${target} parser`,
        error: `Error during \`npm install\` (required for parser generation of ${target} with npm dependencies)`
      })
    }

    steps.push({
      kind: 'shell',
      command: treeSitter,
      args: this.resolveGenerateArgs(),
      cwd,
      info: 'Generating source files from grammar.js...',
      error: 'Error during "tree-sitter generate"'
    })

    return steps
  }

  private resolveGenerateArgs(): string[] {
    if (!this.generateArgs) {
      const {abiVersion} = this.options
      const abi = typeof abiVersion === 'function' ? abiVersion() : (abiVersion ?? defaultAbiVersion)
      this.generateArgs = ['generate', '--abi', String(abi)]
    }

    return [...this.generateArgs]
  }

  private withExtraArgs(step: Step): Step {
    if (!isShellStep(step)) {
      return step
    }

    const extra = this.options.commandExtraArgs?.[step.command]
    return extra && extra.length > 0 ? {...step, args: [...step.args, ...extra]} : step
  }
}
