import process from 'node:process'
import {accessSync, constants, statSync} from 'node:fs'
import {delimiter, isAbsolute, join} from 'node:path'

/** Returns the absolute path of an executable, or undefined when it cannot be run. */
export type ToolLocator = (name: string) => string | undefined

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false
    }

    accessSync(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Looks an executable up on `PATH` (honouring `PATHEXT` on Windows).
 * Names containing a path separator are checked as-is.
 */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const extensions = process.platform === 'win32'
    ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';')]
    : ['']

  if (isAbsolute(name) || name.includes('/') || name.includes('\\')) {
    return extensions.map(ext => name + ext).find(candidate => isExecutableFile(candidate))
  }

  const dirs = (env.PATH ?? '').split(delimiter).filter(dir => dir.length > 0)
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = join(dir, name + ext)
      if (isExecutableFile(candidate)) {
        return candidate
      }
    }
  }

  return undefined
}

/**
 * Picks the first candidate that resolves to an executable.
 * Undefined and empty entries (an unset `CC`) are skipped.
 */
export function selectExecutable(candidates: Array<string | undefined>, locate: ToolLocator): string | undefined {
  for (const candidate of candidates) {
    if (candidate && locate(candidate)) {
      return candidate
    }
  }

  return undefined
}
