import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {writeSampleConfig} from '../sample-config.js'

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a sample configuration file')
    .argument('[file]', 'Where to write the configuration', 'config.yaml')
    .option('-f, --force', 'Overwrite an existing file')
    .action(async (file: string, options: {force?: boolean}) => {
      const target = resolve(file)
      const written = await writeSampleConfig(target, {force: options.force})
      if (!written) {
        console.error(chalk.red(`${target} already exists (use --force to overwrite)`))
        process.exitCode = 1
        return
      }

      console.log(chalk.green(`Wrote ${target}`))
    })
}
