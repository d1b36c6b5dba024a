import type {Command} from 'commander'
import {createInstaller} from '../context.js'
import {exitOnFailures, getGlobalOptions} from '../utils.js'

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Reinstall parsers whose revision changed (all installed ones by default)')
    .argument('[targets...]', 'Parsers to update')
    .option('-s, --sync', 'Update one parser after the other')
    .action(async (targets: string[], options: {sync?: boolean}, cmd: Command) => {
      const {installer} = await createInstaller(getGlobalOptions(cmd))
      const result = await installer.update(targets, {sync: options.sync})
      exitOnFailures(result.failed)
    })
}
