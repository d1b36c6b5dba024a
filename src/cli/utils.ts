import process from 'node:process'
import {homedir} from 'node:os'
import {join} from 'node:path'
import type {Command} from 'commander'

export type GlobalOptions = {
  installDir?: string;
  cacheDir?: string;
  json?: boolean;
  verbose?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export const defaultInstallDir = process.env.PARSNIP_INSTALL_DIR ?? join(homedir(), '.local', 'share', 'parsnip')
export const defaultCacheDir = process.env.PARSNIP_CACHE_DIR ?? join(homedir(), '.cache', 'parsnip')

/**
 * Marks the process as failed when any target of a batch failed.
 */
export function exitOnFailures(failed: string[]): void {
  if (failed.length > 0) {
    process.exitCode = 1
  }
}
