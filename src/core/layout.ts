import {mkdir, readdir} from 'node:fs/promises'
import {fileURLToPath} from 'node:url'
import {join} from 'node:path'

/** Query files bundled with the package, one directory per parser. */
export const defaultQueriesSource = fileURLToPath(new URL('../../runtime/queries', import.meta.url))

/**
 * Directory structure of an install root:
 *
 * ```
 * <root>/parser/<id>.so            compiled parser
 * <root>/parser-info/<id>.revision revision it was built from
 * <root>/queries/<id>              link to the bundled queries
 * ```
 *
 * A parser counts as installed when its library exists in `parser/`.
 */
export class InstallLayout {
  readonly parserDir: string
  readonly infoDir: string
  readonly queriesDir: string

  constructor(
    readonly root: string,
    readonly queriesSource: string = defaultQueriesSource
  ) {
    this.parserDir = join(root, 'parser')
    this.infoDir = join(root, 'parser-info')
    this.queriesDir = join(root, 'queries')
  }

  async ensure(): Promise<void> {
    await mkdir(this.parserDir, {recursive: true})
    await mkdir(this.infoDir, {recursive: true})
    await mkdir(this.queriesDir, {recursive: true})
  }

  parserPath(target: string): string {
    return join(this.parserDir, `${target}.so`)
  }

  queriesPath(target: string): string {
    return join(this.queriesDir, target)
  }

  bundledQueries(target: string): string {
    return join(this.queriesSource, target)
  }

  async installed(): Promise<string[]> {
    let entries: string[]
    try {
      entries = await readdir(this.parserDir)
    } catch {
      return []
    }

    return entries
      .filter(name => name.endsWith('.so'))
      .map(name => name.slice(0, -'.so'.length))
      .sort((a, b) => a.localeCompare(b))
  }

  async isInstalled(target: string): Promise<boolean> {
    const installed = await this.installed()
    return installed.includes(target)
  }
}
