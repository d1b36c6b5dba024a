import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {allTargets} from '../../core/installer.js'
import {createInstaller} from '../context.js'
import {exitOnFailures, getGlobalOptions} from '../utils.js'

type InstallCommandOptions = {
  force?: boolean;
  sync?: boolean;
  generate?: boolean;
  excludeIgnored?: boolean;
}

export function registerInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .description(`Install parsers (languages, tier names or "${allTargets}")`)
    .argument('[targets...]', 'Parsers to install')
    .option('-f, --force', 'Reinstall without asking when already installed')
    .option('-s, --sync', 'Install one parser after the other')
    .option('-g, --generate', 'Generate parsers from their grammar before compiling')
    .option('--exclude-ignored', 'Skip parsers listed under "ignore" in .parsnip.yml')
    .action(async (targets: string[], options: InstallCommandOptions, cmd: Command) => {
      if (targets.length === 0) {
        console.error(chalk.red('No parser to install. Name languages, a tier or "all".'))
        process.exitCode = 1
        return
      }

      const {installer} = await createInstaller(getGlobalOptions(cmd))
      const result = await installer.install(targets, {
        force: options.force,
        sync: options.sync,
        generateFromSource: options.generate,
        excludeIgnored: options.excludeIgnored
      })
      exitOnFailures(result.failed)
    })
}
