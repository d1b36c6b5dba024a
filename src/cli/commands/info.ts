import chalk from 'chalk'
import type {Command} from 'commander'
import {createInstaller} from '../context.js'
import {getGlobalOptions} from '../utils.js'

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .alias('ls')
    .description('List available parsers and whether they are installed')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const globals = getGlobalOptions(cmd)
      const {installer} = await createInstaller(globals)
      const rows = await installer.info()

      if (globals.json) {
        console.log(JSON.stringify(rows))
        return
      }

      const nameWidth = Math.max('PARSER'.length, ...rows.map(r => r.target.length))
      console.log(chalk.bold(`${'PARSER'.padEnd(nameWidth)}  INSTALLED  TIER`))
      for (const row of rows) {
        const installed = row.installed ? chalk.green('✓'.padEnd(9)) : chalk.gray('-'.padEnd(9))
        console.log(`${row.target.padEnd(nameWidth)}  ${installed}  ${row.tier ?? ''}`)
      }
    })
}
