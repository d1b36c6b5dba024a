import {readFile} from 'node:fs/promises'
import {fileURLToPath} from 'node:url'
import {ConfigurationError, UnknownTargetError} from '../errors.js'
import type {Catalog, InstallInfo, ParserDefinition} from '../types.js'

/** Catalog shipped at the package root. */
export const defaultCatalogPath = fileURLToPath(new URL('../../parsers.json', import.meta.url))

/**
 * Known parsers and the tiers grouping them.
 */
export class ParserRegistry {
  /**
   * Reads a catalog file; `overrides` (from the project config) add parsers
   * or replace catalog entries wholesale.
   */
  static async load(catalogPath = defaultCatalogPath, overrides?: Record<string, ParserDefinition>): Promise<ParserRegistry> {
    const content = await readFile(catalogPath, 'utf8')
    const catalog: unknown = JSON.parse(content)
    if (!isCatalog(catalog)) {
      throw new ConfigurationError(`Invalid parser catalog ${catalogPath}: "tiers" and "parsers" are required`)
    }

    return new ParserRegistry({tiers: catalog.tiers, parsers: {...catalog.parsers, ...overrides}})
  }

  constructor(private readonly catalog: Catalog) {}

  get tiers(): string[] {
    return [...this.catalog.tiers]
  }

  has(target: string): boolean {
    return Object.hasOwn(this.catalog.parsers, target)
  }

  get(target: string): ParserDefinition {
    if (!this.has(target)) {
      throw new UnknownTargetError(target)
    }

    return this.catalog.parsers[target]
  }

  /**
   * Install info of a parser, checked for the fields every build needs.
   */
  installInfo(target: string): InstallInfo {
    const {installInfo} = this.get(target)
    if (!installInfo || typeof installInfo !== 'object') {
      throw new ConfigurationError(`Parser ${target}: installInfo is required`)
    }

    if (!installInfo.url || typeof installInfo.url !== 'string') {
      throw new ConfigurationError(`Parser ${target}: installInfo.url is required and must be a string`)
    }

    if (!Array.isArray(installInfo.files) || installInfo.files.length === 0) {
      throw new ConfigurationError(`Parser ${target}: installInfo.files must be a non-empty array`)
    }

    return installInfo
  }

  /**
   * Sorted parser ids, optionally restricted to one tier (1-based).
   */
  available(tier?: number): string[] {
    return Object.entries(this.catalog.parsers)
      .filter(([, definition]) => tier === undefined || definition.tier === tier)
      .map(([target]) => target)
      .sort((a, b) => a.localeCompare(b))
  }

  /** 1-based tier number of a group alias, undefined for anything else. */
  tierOf(token: string): number | undefined {
    const index = this.catalog.tiers.indexOf(token)
    return index === -1 ? undefined : index + 1
  }

  tierName(target: string): string | undefined {
    const {tier} = this.get(target)
    return tier === undefined ? undefined : this.catalog.tiers[tier - 1]
  }
}

function isCatalog(value: unknown): value is Catalog {
  return typeof value === 'object' && value !== null
    && 'tiers' in value && Array.isArray(value.tiers) && value.tiers.every(tier => typeof tier === 'string')
    && 'parsers' in value && typeof value.parsers === 'object' && value.parsers !== null
}
