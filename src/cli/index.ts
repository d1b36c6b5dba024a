#!/usr/bin/env node
import 'dotenv/config'
import {Command} from 'commander'
import {registerInfoCommand} from './commands/info.js'
import {registerInstallCommand} from './commands/install.js'
import {registerOutdatedCommand} from './commands/outdated.js'
import {registerUninstallCommand} from './commands/uninstall.js'
import {registerUpdateCommand} from './commands/update.js'
import {defaultCacheDir, defaultInstallDir} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('parsnip')
    .description('Download, build and manage tree-sitter parsers')
    .version('0.1.0')
    .option('--install-dir <path>', `Where parsers and queries are installed (default: ${defaultInstallDir})`)
    .option('--cache-dir <path>', `Where sources are downloaded and built (default: ${defaultCacheDir})`)
    .option('--json', 'Output structured JSON logs')
    .option('--verbose', 'Stream compiler and download output in real-time (interactive mode)')

  registerInstallCommand(program)
  registerUpdateCommand(program)
  registerUninstallCommand(program)
  registerInfoCommand(program)
  registerOutdatedCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
