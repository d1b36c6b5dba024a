import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {fileURLToPath} from 'node:url'
import type {InstallInfo} from '../types.js'

/** Lockfile shipped at the package root. */
export const defaultLockfilePath = fileURLToPath(new URL('../../lockfile.json', import.meta.url))

/**
 * Pinned revision of a parser, as stored in `lockfile.json`.
 */
export type LockfileEntry = {
  revision: string;
}

export type Lockfile = Record<string, LockfileEntry>

/**
 * Decides which revision of a parser should be installed and whether the
 * installed one is stale.
 *
 * ## Precedence
 *
 * 1. `revision` in the parser's install info
 * 2. the lockfile entry for the parser
 * 3. none: the parser is unpinned and whatever gets fetched is accepted
 *
 * The lockfile is read once, on first use, and cached until `invalidate()`;
 * a read that fails is not cached. Parsers with an explicit revision never
 * read it.
 * A missing lockfile counts as an empty one.
 */
export class RevisionResolver {
  private lockfile?: Promise<Lockfile>

  constructor(
    private readonly installInfo: (target: string) => InstallInfo,
    private readonly lockfilePath: string,
    private readonly infoDir: string
  ) {}

  async resolve(target: string): Promise<string | undefined> {
    const info = this.installInfo(target)
    if (info.revision) {
      return info.revision
    }

    const lockfile = await this.loadLockfile()
    return lockfile[target]?.revision
  }

  /**
   * Revision recorded by the last successful install, if any.
   */
  async installedRevision(target: string): Promise<string | undefined> {
    try {
      const content = await readFile(this.markerPath(target), 'utf8')
      return content.split(/\r?\n/)[0]
    } catch {
      return undefined
    }
  }

  /**
   * True when the parser is unpinned, was never built by us, or was built
   * from a different revision. Never throws: a parser whose state cannot be
   * determined needs an update.
   */
  async needsUpdate(target: string): Promise<boolean> {
    try {
      const revision = await this.resolve(target)
      if (!revision) {
        return true
      }

      return revision !== await this.installedRevision(target)
    } catch {
      return true
    }
  }

  markerPath(target: string): string {
    return join(this.infoDir, `${target}.revision`)
  }

  /** Forgets the cached lockfile; the next lookup reads it again. */
  invalidate(): void {
    this.lockfile = undefined
  }

  private async loadLockfile(): Promise<Lockfile> {
    this.lockfile ??= readLockfile(this.lockfilePath)
    try {
      return await this.lockfile
    } catch (error: unknown) {
      // A failed read is retried on the next lookup
      this.lockfile = undefined
      throw error
    }
  }
}

export async function readLockfile(path: string): Promise<Lockfile> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed = JSON.parse(content) as unknown
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {}
  }

  const lockfile: Lockfile = {}
  for (const [target, entry] of Object.entries(parsed)) {
    if (typeof entry === 'object' && entry !== null && 'revision' in entry && typeof entry.revision === 'string') {
      lockfile[target] = {revision: entry.revision}
    }
  }

  return lockfile
}
