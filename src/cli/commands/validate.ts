import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadConfigFile} from '../../core/config-loader.js'
import {validateConfig} from '../../core/config-validator.js'
import {getGlobalOptions} from '../utils.js'

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a configuration file without touching Docker')
    .argument('<config>', 'Path to the YAML configuration file')
    .action(async (configFile: string, _options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)

      const raw = await loadConfigFile(configFile)
      const config = raw.ok ? validateConfig(raw.value) : raw
      if (!config.ok) {
        if (json) {
          console.log(JSON.stringify({valid: false, kind: config.error.kind, message: config.error.message}))
        } else {
          console.error(chalk.red(config.error.message))
        }

        process.exitCode = 1
        return
      }

      if (json) {
        console.log(JSON.stringify({valid: true, config: config.value}))
        return
      }

      const {input, output} = config.value.docker
      console.log(chalk.green('Configuration file is valid.'))
      console.log(`  Base image:  ${input.base_image}`)
      console.log(`  Type:        ${input.type}`)
      console.log(`  Port:        ${input.exposed_port}`)
      console.log(`  Output tag:  ${output.tag}`)
      console.log(`  Block:       ${config.value.manifest.name} (${config.value.manifest.type})`)
    })
}
