#!/usr/bin/env node
import 'dotenv/config'
import {Command} from 'commander'
import {registerInitCommand} from './commands/init.js'
import {registerPackageCommand} from './commands/package.js'
import {registerValidateCommand} from './commands/validate.js'
import {parsePositiveInteger} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('blockpack')
    .description('Package an existing Docker image as a platform block')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs')
    .option('--validation-url <url>', 'Manifest validation endpoint (default: BLOCKPACK_VALIDATION_URL)')
    .option('--validation-timeout <ms>', 'Manifest validation timeout in milliseconds', parsePositiveInteger)

  registerPackageCommand(program)
  registerValidateCommand(program)
  registerInitCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
