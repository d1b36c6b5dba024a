import chalk from 'chalk'
import type {Command} from 'commander'
import {createInstaller} from '../context.js'
import {getGlobalOptions} from '../utils.js'

export function registerOutdatedCommand(program: Command): void {
  program
    .command('outdated')
    .description('List installed parsers that differ from their pinned revision')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const globals = getGlobalOptions(cmd)
      const {installer} = await createInstaller(globals)
      const outdated = await installer.outdated()

      if (globals.json) {
        console.log(JSON.stringify(outdated))
        return
      }

      if (outdated.length === 0) {
        console.log(chalk.gray('All parsers are up-to-date!'))
        return
      }

      for (const target of outdated) {
        console.log(target)
      }
    })
}
