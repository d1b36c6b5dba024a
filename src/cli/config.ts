import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigurationError} from '../errors.js'
import type {ParsnipConfig} from '../types.js'

export const configFileName = '.parsnip.yml'

/**
 * Loads the project-level `.parsnip.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<ParsnipConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFileName), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`${configFileName} must contain a mapping`)
  }

  return parsed
}
