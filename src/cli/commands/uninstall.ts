import type {Command} from 'commander'
import {createInstaller} from '../context.js'
import {exitOnFailures, getGlobalOptions} from '../utils.js'

export function registerUninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .alias('rm')
    .description('Remove installed parsers')
    .argument('<targets...>', 'Parsers to remove, or "all"')
    .option('-s, --sync', 'Remove one parser after the other')
    .action(async (targets: string[], options: {sync?: boolean}, cmd: Command) => {
      const {installer} = await createInstaller(getGlobalOptions(cmd))
      const result = await installer.uninstall(targets, {sync: options.sync})
      exitOnFailures(result.failed)
    })
}
