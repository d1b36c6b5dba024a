import {existsSync, lstatSync, mkdirSync, writeFileSync} from 'node:fs'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import type {Catalog} from '../../types.js'
import {CommandBuilder} from '../command-builder.js'
import {Installer} from '../installer.js'
import {JobRunner} from '../job-runner.js'
import {InstallLayout} from '../layout.js'
import {ProgressTracker} from '../progress.js'
import {ParserRegistry} from '../registry.js'
import type {InstallEvent, Reporter} from '../reporter.js'
import {RevisionResolver} from '../revision.js'
import {createTmpDir, FakeExecutor, fakeLocator, recordingReporter} from '../../__tests__/helpers.js'

type SetupOptions = {
  /** Parser id → tier (0 for none). */
  parsers: Record<string, number>;
  tiers?: string[];
  installed?: string[];
  markers?: Record<string, string>;
  lockfile?: Record<string, string>;
  ignored?: string[];
  answer?: boolean;
  failCompile?: string[];
  /** The reporter throws when this parser finishes. */
  reporterFailsOn?: string;
}

/**
 * Installer over local grammar sources in a temporary directory: every
 * "compile" is scripted, the source already holds a parser.so.
 */
async function setup(options: SetupOptions) {
  const dir = await createTmpDir()
  const catalog: Catalog = {tiers: options.tiers ?? ['stable', 'community'], parsers: {}}
  for (const [target, tier] of Object.entries(options.parsers)) {
    const source = join(dir, 'sources', target)
    mkdirSync(source, {recursive: true})
    writeFileSync(join(source, 'parser.so'), `library:${target}`, 'utf8')
    catalog.parsers[target] = {
      installInfo: {url: source, files: ['src/parser.c']},
      tier: tier === 0 ? undefined : tier
    }
  }

  const layout = new InstallLayout(join(dir, 'install'), join(dir, 'queries'))
  await layout.ensure()
  for (const target of options.installed ?? []) {
    writeFileSync(layout.parserPath(target), `old:${target}`, 'utf8')
  }

  for (const [target, revision] of Object.entries(options.markers ?? {})) {
    writeFileSync(join(layout.infoDir, `${target}.revision`), `${revision}\n`, 'utf8')
  }

  const lockfilePath = join(dir, 'lockfile.json')
  const lockfile = Object.fromEntries(Object.entries(options.lockfile ?? {}).map(([target, revision]) => [target, {revision}]))
  writeFileSync(lockfilePath, JSON.stringify(lockfile), 'utf8')

  const registry = new ParserRegistry(catalog)
  const resolver = new RevisionResolver(target => registry.installInfo(target), lockfilePath, layout.infoDir)
  const failCompile = new Set((options.failCompile ?? []).map(target => join(dir, 'sources', target)))
  const executor = new FakeExecutor(request => request.cwd && failCompile.has(request.cwd)
    ? {exitCode: 1, stderr: 'parser.c:1: error'}
    : undefined)
  const progress = new ProgressTracker()
  const recording = recordingReporter()
  const {events} = recording
  const reporter: Reporter = {
    emit(event) {
      recording.reporter.emit(event)
      if (event.event === 'TARGET_FINISHED' && event.target === options.reporterFailsOn) {
        throw new Error('display broken')
      }
    }
  }
  const questions: string[] = []

  const installer = new Installer({
    registry,
    layout,
    resolver,
    builder: new CommandBuilder({locate: fakeLocator('cc'), env: {}}),
    runner: new JobRunner(executor, progress, reporter),
    progress,
    reporter,
    prompt: {
      async confirm(message) {
        questions.push(message)
        return options.answer ?? false
      }
    },
    cacheDir: join(dir, 'cache'),
    ignored: options.ignored
  })

  /** Targets whose compile step ran, in order. */
  const compiled = () => executor.requests.map(request => (request.cwd ?? '').slice(join(dir, 'sources').length + 1))

  return {dir, installer, layout, progress, events, questions, compiled}
}

function eventsOf<K extends InstallEvent['event']>(events: InstallEvent[], kind: K): Array<Extract<InstallEvent, {event: K}>> {
  return events.filter((event): event is Extract<InstallEvent, {event: K}> => event.event === kind)
}

// -- expand ------------------------------------------------------------------

test('expand substitutes tier aliases in place and drops duplicates', async t => {
  const {installer} = await setup({parsers: {a: 1, b: 2, c: 1}})
  t.deepEqual(installer.expand(['b', 'stable', 'a']), ['b', 'a', 'c'])
})

test('expand: all means every available parser', async t => {
  const {installer} = await setup({parsers: {a: 1, b: 2, c: 0}})
  t.deepEqual(installer.expand(['b', 'all']), ['a', 'b', 'c'])
})

// -- install -----------------------------------------------------------------

test('install builds, records the resolved revision and links queries', async t => {
  const {installer, layout, events} = await setup({parsers: {a: 1}, lockfile: {a: 'rev-a'}})
  const result = await installer.install(['a'])

  t.deepEqual(result, {succeeded: ['a'], failed: [], skipped: []})
  t.is(await readFile(layout.parserPath('a'), 'utf8'), 'library:a')
  t.is(await readFile(join(layout.infoDir, 'a.revision'), 'utf8'), 'rev-a\n')
  t.true(lstatSync(layout.queriesPath('a')).isSymbolicLink())
  t.deepEqual(eventsOf(events, 'BATCH_FINISHED'), [{event: 'BATCH_FINISHED', action: 'install', status: '1/1'}])
})

test('install all with excludeIgnored never builds ignored parsers', async t => {
  const {installer, events, compiled} = await setup({parsers: {a: 1, b: 1, c: 2}, ignored: ['b']})
  const result = await installer.install(['all'], {excludeIgnored: true})

  t.deepEqual(result.succeeded, ['a', 'c'])
  t.deepEqual(compiled(), ['a', 'c'])
  t.deepEqual(eventsOf(events, 'BATCH_START'), [{event: 'BATCH_START', action: 'install', targets: ['a', 'c']}])
})

test('ignored parsers are installed when not excluded', async t => {
  const {installer, compiled} = await setup({parsers: {a: 1, b: 1}, ignored: ['b']})
  await installer.install(['a', 'b'])
  t.deepEqual(compiled(), ['a', 'b'])
})

test('declining the reinstall prompt skips the parser', async t => {
  const {installer, events, questions, compiled} = await setup({parsers: {a: 1, b: 1}, installed: ['a'], answer: false})
  const result = await installer.install(['a', 'b'])

  t.deepEqual(questions, ['a parser already available: would you like to reinstall?'])
  t.deepEqual(result, {succeeded: ['b'], failed: [], skipped: ['a']})
  t.deepEqual(compiled(), ['b'])
  t.deepEqual(eventsOf(events, 'TARGET_SKIPPED'), [{event: 'TARGET_SKIPPED', target: 'a', reason: 'declined'}])
})

test('force reinstalls without asking', async t => {
  const {installer, questions, compiled} = await setup({parsers: {a: 1}, installed: ['a']})
  await installer.install(['a'], {force: true})
  t.deepEqual(questions, [])
  t.deepEqual(compiled(), ['a'])
})

test('install all ignores force and asks for installed parsers', async t => {
  const {installer, questions} = await setup({parsers: {a: 1, b: 1}, installed: ['b'], answer: true})
  await installer.install(['all'], {force: true})
  t.deepEqual(questions, ['b parser already available: would you like to reinstall?'])
})

test('unknown parsers are reported and the batch goes on', async t => {
  const {installer, events, compiled} = await setup({parsers: {a: 1}})
  const result = await installer.install(['nope', 'a'])

  t.deepEqual(result, {succeeded: ['a'], failed: ['nope'], skipped: []})
  t.deepEqual(compiled(), ['a'])
  t.deepEqual(eventsOf(events, 'TARGET_ERROR'), [{
    event: 'TARGET_ERROR',
    target: 'nope',
    code: 'UNKNOWN_TARGET',
    message: 'Parser not available for language "nope"'
  }])
})

test('a failed build leaves no query link and does not stop siblings', async t => {
  const {installer, layout, progress} = await setup({parsers: {a: 1, b: 1, c: 1}, failCompile: ['b']})
  const result = await installer.install(['a', 'b', 'c'])

  t.deepEqual(result, {succeeded: ['a', 'c'], failed: ['b'], skipped: []})
  t.false(existsSync(layout.parserPath('b')))
  t.throws(() => lstatSync(layout.queriesPath('b')))
  t.is(progress.status(), '3/3, failed: 1')
})

test('a pipeline that throws is recorded as failed without losing its siblings', async t => {
  const {installer, events, progress} = await setup({parsers: {a: 1, b: 1, c: 1}, reporterFailsOn: 'b'})
  const result = await installer.install(['a', 'b', 'c'])

  t.deepEqual(result, {succeeded: ['a', 'c'], failed: ['b'], skipped: []})
  t.deepEqual(eventsOf(events, 'TARGET_ERROR'), [{event: 'TARGET_ERROR', target: 'b', code: 'INTERNAL_ERROR', message: 'display broken'}])
  t.true(progress.isIdle)
})

test('sync batches survive a pipeline that throws', async t => {
  const {installer} = await setup({parsers: {a: 1, b: 1}, reporterFailsOn: 'a'})
  const result = await installer.install(['a', 'b'], {sync: true})
  t.deepEqual(result, {succeeded: ['b'], failed: ['a'], skipped: []})
})

test('sync install runs pipelines one after the other', async t => {
  const {installer, events} = await setup({parsers: {a: 1, b: 1}})
  const result = await installer.install(['a', 'b'], {sync: true})

  t.deepEqual(result.succeeded, ['a', 'b'])
  t.deepEqual(
    eventsOf(events, 'TARGET_FINISHED').map(event => event.status),
    ['1/1', '2/2']
  )
})

// -- update ------------------------------------------------------------------

const fiveInstalled = {
  parsers: {a: 1, b: 1, c: 1, d: 2, e: 2},
  installed: ['a', 'b', 'c', 'd', 'e'],
  lockfile: {a: 'r1', b: 'r1', c: 'r1', d: 'r1', e: 'r1'},
  markers: {a: 'r1', b: 'r0', c: 'r1', d: 'r0', e: 'r1'}
}

test('update without targets rebuilds exactly the outdated parsers', async t => {
  const {installer, events, questions, compiled} = await setup(fiveInstalled)
  const result = await installer.update([])

  t.deepEqual(compiled(), ['b', 'd'])
  t.deepEqual(result, {succeeded: ['b', 'd'], failed: [], skipped: []})
  t.deepEqual(questions, [])
  t.deepEqual(eventsOf(events, 'BATCH_START'), [{event: 'BATCH_START', action: 'update', targets: ['b', 'd']}])
  t.deepEqual(eventsOf(events, 'NOTICE'), [])
})

test('update all skips ignored parsers', async t => {
  const {installer, compiled} = await setup({...fiveInstalled, ignored: ['d']})
  await installer.update(['all'])
  t.deepEqual(compiled(), ['b'])
})

test('update with nothing outdated only notifies', async t => {
  const {installer, events, compiled} = await setup({...fiveInstalled, markers: {a: 'r1', b: 'r1', c: 'r1', d: 'r1', e: 'r1'}})
  const result = await installer.update([])

  t.deepEqual(compiled(), [])
  t.deepEqual(result, {succeeded: [], failed: [], skipped: []})
  t.deepEqual(events, [{event: 'NOTICE', message: 'All parsers are up-to-date!'}])
})

test('update with targets keeps missing or outdated ones', async t => {
  const {installer, compiled} = await setup({...fiveInstalled, parsers: {...fiveInstalled.parsers, f: 2}})
  await installer.update(['a', 'b', 'f'])
  t.deepEqual(compiled(), ['b', 'f'])
})

test('update with up-to-date targets only notifies', async t => {
  const {installer, events} = await setup(fiveInstalled)
  await installer.update(['a', 'c'])
  t.deepEqual(events, [{event: 'NOTICE', message: 'Parsers are up-to-date!'}])
})

test('updated parsers record the new revision', async t => {
  const {installer, layout} = await setup(fiveInstalled)
  await installer.update([])
  t.is(await readFile(join(layout.infoDir, 'b.revision'), 'utf8'), 'r1\n')
  t.deepEqual(await installer.outdated(), [])
})

// -- uninstall ---------------------------------------------------------------

test('uninstall removes library, queries and marker', async t => {
  const {installer, layout} = await setup({parsers: {a: 1}, lockfile: {a: 'r1'}})
  await installer.install(['a'])
  const result = await installer.uninstall(['a'])

  t.deepEqual(result, {succeeded: ['a'], failed: [], skipped: []})
  t.false(existsSync(layout.parserPath('a')))
  t.false(existsSync(join(layout.infoDir, 'a.revision')))
  t.throws(() => lstatSync(layout.queriesPath('a')))
})

test('uninstall reports parsers that are not installed and continues', async t => {
  const {installer, layout, events} = await setup({parsers: {a: 1, b: 1}, installed: ['a', 'b']})
  const result = await installer.uninstall(['a', 'nope', 'b'])

  t.deepEqual(result, {succeeded: ['a', 'b'], failed: ['nope'], skipped: []})
  t.deepEqual(await layout.installed(), [])
  t.deepEqual(eventsOf(events, 'TARGET_ERROR'), [{
    event: 'TARGET_ERROR',
    target: 'nope',
    code: 'UNRECOGNIZED_TARGET',
    message: 'Parser for nope is not managed by parsnip'
  }])
})

test('uninstall all removes every installed parser', async t => {
  const {installer, layout} = await setup({parsers: {a: 1, b: 1, c: 1}, installed: ['a', 'c']})
  const result = await installer.uninstall(['all'], {sync: true})
  t.deepEqual(result.succeeded, ['a', 'c'])
  t.deepEqual(await layout.installed(), [])
})

// -- info --------------------------------------------------------------------

test('info lists every parser with its install state and tier', async t => {
  const {installer} = await setup({parsers: {a: 1, b: 2, c: 0}, installed: ['b']})
  t.deepEqual(await installer.info(), [
    {target: 'a', installed: false, tier: 'stable'},
    {target: 'b', installed: true, tier: 'community'},
    {target: 'c', installed: false, tier: undefined}
  ])
})
