import process from 'node:process'
import {resolve} from 'node:path'
import {CommandBuilder} from '../core/command-builder.js'
import {Installer, type Prompt} from '../core/installer.js'
import {JobRunner} from '../core/job-runner.js'
import {InstallLayout} from '../core/layout.js'
import {ProgressTracker} from '../core/progress.js'
import {ParserRegistry} from '../core/registry.js'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import {defaultLockfilePath, RevisionResolver} from '../core/revision.js'
import {ExecaProcessExecutor} from '../engine/execa-executor.js'
import {loadConfig} from './config.js'
import {InteractiveReporter} from './interactive-reporter.js'
import {createClackPrompt, fixedPrompt} from './prompt.js'
import {defaultCacheDir, defaultInstallDir, type GlobalOptions} from './utils.js'

export type InstallerContext = {
  installer: Installer;
  registry: ParserRegistry;
  layout: InstallLayout;
}

export function createReporter(options: GlobalOptions): Reporter {
  return options.json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
}

/**
 * Wires an installer from the global options and the `.parsnip.yml` of the
 * working directory. Command-line options win over the config file, which
 * wins over environment defaults. Without a terminal, reinstall prompts
 * answer no.
 */
export async function createInstaller(options: GlobalOptions, overrides?: {reporter?: Reporter; prompt?: Prompt}): Promise<InstallerContext> {
  const config = await loadConfig(process.cwd())
  const installDir = resolve(options.installDir ?? config.installDir ?? defaultInstallDir)
  const cacheDir = resolve(options.cacheDir ?? config.cacheDir ?? defaultCacheDir)

  const registry = await ParserRegistry.load(undefined, config.parsers)
  const layout = new InstallLayout(installDir)
  const resolver = new RevisionResolver(
    target => registry.installInfo(target),
    config.lockfile ? resolve(config.lockfile) : defaultLockfilePath,
    layout.infoDir
  )
  const builder = new CommandBuilder({
    compilers: config.compilers,
    abiVersion: config.abiVersion,
    preferGit: config.preferGit,
    commandExtraArgs: config.commandExtraArgs
  })

  const reporter = overrides?.reporter ?? createReporter(options)
  const progress = new ProgressTracker()
  const runner = new JobRunner(new ExecaProcessExecutor(), progress, reporter)

  const installer = new Installer({
    registry,
    layout,
    resolver,
    builder,
    runner,
    progress,
    reporter,
    prompt: overrides?.prompt ?? (process.stdin.isTTY ? createClackPrompt() : fixedPrompt(false)),
    cacheDir,
    ignored: config.ignore
  })

  return {installer, registry, layout}
}
