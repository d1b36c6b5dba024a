import {rmSync, symlinkSync} from 'node:fs'
import {uniq} from 'lodash-es'
import {ParsnipError, UnrecognizedTargetError} from '../errors.js'
import type {Pipeline} from '../types.js'
import type {CommandBuilder} from './command-builder.js'
import type {JobResult, JobRunner} from './job-runner.js'
import type {InstallLayout} from './layout.js'
import type {ProgressTracker} from './progress.js'
import type {ParserRegistry} from './registry.js'
import type {BatchAction, Reporter} from './reporter.js'
import type {RevisionResolver} from './revision.js'

/** Token standing for every available parser. */
export const allTargets = 'all'

/**
 * Asks the user a yes/no question.
 */
export type Prompt = {
  confirm(message: string): Promise<boolean>;
}

export type InstallOptions = {
  /** Reinstall without asking when the parser is already installed. */
  force?: boolean;
  /** Run each pipeline to completion, blocking, before the next one. */
  sync?: boolean;
  generateFromSource?: boolean;
  /** Drop targets listed in the `ignore` configuration. */
  excludeIgnored?: boolean;
}

export type BatchResult = {
  succeeded: string[];
  failed: string[];
  skipped: string[];
}

export type ParserStatus = {
  target: string;
  installed: boolean;
  tier?: string;
}

export type InstallerDependencies = {
  registry: ParserRegistry;
  layout: InstallLayout;
  resolver: RevisionResolver;
  builder: CommandBuilder;
  runner: JobRunner;
  progress: ProgressTracker;
  reporter: Reporter;
  prompt: Prompt;
  cacheDir: string;
  ignored?: string[];
}

/**
 * Collects the outcome of the pipelines of one batch. Sync pipelines are
 * recorded as they complete; async ones are awaited together in `settle()`.
 */
class Batch {
  private readonly result: BatchResult = {succeeded: [], failed: [], skipped: []}
  private readonly running: Array<Promise<void>> = []

  constructor(
    private readonly runner: JobRunner,
    private readonly sync: boolean,
    private readonly onRejected: (target: string, error: unknown) => void
  ) {}

  submit(pipeline: Pipeline): void {
    if (this.sync) {
      try {
        this.record(this.runner.runSync(pipeline))
      } catch (error: unknown) {
        this.reject(pipeline.target, error)
      }

      return
    }

    this.running.push(this.runner.run(pipeline).then(
      result => {
        this.record(result)
      },
      (error: unknown) => {
        this.reject(pipeline.target, error)
      }
    ))
  }

  skip(target: string): void {
    this.result.skipped.push(target)
  }

  fail(target: string): void {
    this.result.failed.push(target)
  }

  async settle(): Promise<BatchResult> {
    await Promise.all(this.running)
    return this.result
  }

  private reject(target: string, error: unknown): void {
    this.result.failed.push(target)
    this.onRejected(target, error)
  }

  private record(result: JobResult): void {
    if (result.ok) {
      this.result.succeeded.push(result.target)
    } else {
      this.result.failed.push(result.target)
    }
  }
}

/**
 * Expands batch requests into targets and drives one pipeline per target.
 *
 * A target rejected before its pipeline exists (unknown parser, invalid
 * install info, missing tool, not installed) is reported and skipped; a
 * failing pipeline only stops its own steps. Neither affects the other
 * targets of the batch.
 */
export class Installer {
  private readonly ignored: Set<string>

  constructor(private readonly deps: InstallerDependencies) {
    this.ignored = new Set(deps.ignored ?? [])
  }

  /**
   * Replaces `all` with every available parser and each tier alias with its
   * members, in place. Duplicates keep their first position.
   */
  expand(requested: string[]): string[] {
    const {registry} = this.deps
    if (requested.includes(allTargets)) {
      return registry.available()
    }

    return uniq(requested.flatMap(token => {
      const tier = registry.tierOf(token)
      return tier === undefined ? [token] : registry.available(tier)
    }))
  }

  async install(requested: string[], options: InstallOptions = {}): Promise<BatchResult> {
    this.deps.progress.reset()
    // Installing everything never reinstalls silently
    const force = requested.includes(allTargets) ? false : (options.force ?? false)
    return this.installTargets('install', this.expand(requested), {...options, force})
  }

  /**
   * Reinstalls parsers whose installed revision differs from the wanted one.
   * Without explicit targets (or with `all`), every installed, non-ignored
   * parser is checked.
   */
  async update(requested: string[], options: {sync?: boolean} = {}): Promise<BatchResult> {
    const {progress, resolver, reporter, layout} = this.deps
    progress.reset()
    resolver.invalidate()

    if (requested.length > 0 && !requested.includes(allTargets)) {
      const installed = await layout.installed()
      const stale: string[] = []
      for (const target of this.expand(requested)) {
        if (!installed.includes(target) || await resolver.needsUpdate(target)) {
          stale.push(target)
        }
      }

      if (stale.length === 0) {
        reporter.emit({event: 'NOTICE', message: 'Parsers are up-to-date!'})
        return {succeeded: [], failed: [], skipped: []}
      }

      return this.installTargets('update', stale, {force: true, sync: options.sync})
    }

    const outdated = await this.outdated()
    if (outdated.length === 0) {
      reporter.emit({event: 'NOTICE', message: 'All parsers are up-to-date!'})
      return {succeeded: [], failed: [], skipped: []}
    }

    return this.installTargets('update', outdated, {force: true, sync: options.sync, excludeIgnored: true})
  }

  /**
   * Removes the library, query link and revision marker of each target.
   * Targets that are not installed are reported and the batch goes on.
   */
  async uninstall(requested: string[], options: {sync?: boolean} = {}): Promise<BatchResult> {
    const {progress, reporter, layout, resolver, runner} = this.deps
    progress.reset()

    const installed = await layout.installed()
    const targets = requested.includes(allTargets) ? installed : uniq(requested)
    const batch = new Batch(runner, options.sync ?? false, (target, error) => {
      this.reportRejected(target, error)
    })
    reporter.emit({event: 'BATCH_START', action: 'uninstall', targets})

    for (const target of targets) {
      if (!installed.includes(target)) {
        this.reportRejected(target, new UnrecognizedTargetError(target))
        batch.fail(target)
        continue
      }

      const library = layout.parserPath(target)
      const queries = layout.queriesPath(target)
      const marker = resolver.markerPath(target)
      batch.submit({
        target,
        steps: [
          {kind: 'action', action: () => rmSync(library, {force: true})},
          {kind: 'action', action: () => rmSync(queries, {recursive: true, force: true})},
          {kind: 'action', action: () => rmSync(marker, {force: true})}
        ],
        successMessage: `Parser for ${target} has been uninstalled`
      })
    }

    return this.finish('uninstall', batch)
  }

  /** Installed parsers whose revision is not the wanted one. */
  async outdated(): Promise<string[]> {
    const installed = await this.deps.layout.installed()
    const outdated: string[] = []
    for (const target of installed) {
      if (await this.deps.resolver.needsUpdate(target)) {
        outdated.push(target)
      }
    }

    return outdated
  }

  async info(): Promise<ParserStatus[]> {
    const {registry, layout} = this.deps
    const installed = new Set(await layout.installed())
    return registry.available().map(target => ({
      target,
      installed: installed.has(target),
      tier: registry.tierName(target)
    }))
  }

  private async installTargets(action: BatchAction, expanded: string[], options: InstallOptions): Promise<BatchResult> {
    const {layout, prompt, reporter, runner} = this.deps
    const targets = options.excludeIgnored ? expanded.filter(target => !this.ignored.has(target)) : expanded
    const batch = new Batch(runner, options.sync ?? false, (target, error) => {
      this.reportRejected(target, error)
    })

    await layout.ensure()
    reporter.emit({event: 'BATCH_START', action, targets})

    for (const target of targets) {
      if (!options.force && await layout.isInstalled(target)) {
        const confirmed = await prompt.confirm(`${target} parser already available: would you like to reinstall?`)
        if (!confirmed) {
          reporter.emit({event: 'TARGET_SKIPPED', target, reason: 'declined'})
          batch.skip(target)
          continue
        }
      }

      let pipeline: Pipeline
      try {
        pipeline = await this.installPipeline(target, options.generateFromSource ?? false)
      } catch (error: unknown) {
        this.reportRejected(target, error)
        batch.fail(target)
        continue
      }

      batch.submit(pipeline)
    }

    return this.finish(action, batch)
  }

  /**
   * Build pipeline of a target, followed by linking its bundled queries into
   * the install location. The link is only made when the build succeeded.
   */
  private async installPipeline(target: string, generateFromSource: boolean): Promise<Pipeline> {
    const {registry, resolver, builder, layout, cacheDir} = this.deps
    const info = registry.installInfo(target)
    const revision = await resolver.resolve(target)
    const pipeline = builder.build(target, info, {
      cacheDir,
      libraryPath: layout.parserPath(target),
      markerPath: resolver.markerPath(target),
      revision,
      generateFromSource
    })

    const source = layout.bundledQueries(target)
    const link = layout.queriesPath(target)
    pipeline.steps.push({
      kind: 'action',
      action() {
        rmSync(link, {recursive: true, force: true})
        symlinkSync(source, link, 'dir')
      }
    })

    return pipeline
  }

  private reportRejected(target: string, error: unknown): void {
    const code = error instanceof ParsnipError ? error.code : 'INTERNAL_ERROR'
    const message = error instanceof Error ? error.message : String(error)
    this.deps.reporter.emit({event: 'TARGET_ERROR', target, code, message})
  }

  private async finish(action: BatchAction, batch: Batch): Promise<BatchResult> {
    const result = await batch.settle()
    this.deps.reporter.emit({event: 'BATCH_FINISHED', action, status: this.deps.progress.status()})
    return result
  }
}
