import process from 'node:process'
import type {Command} from 'commander'
import {DockerCliEngine} from '../../engine/docker-engine.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {Packager} from '../../core/packager.js'
import {HttpValidationClient} from '../../core/validation-client.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {getGlobalOptions, resolveSettings} from '../utils.js'

export function registerPackageCommand(program: Command): void {
  program
    .command('package')
    .description('Package an existing Docker image as a block')
    .argument('<config>', 'Path to the YAML configuration file')
    .argument('<destination>', 'Output directory for the generated build files')
    .option('--verbose', 'Stream pull and build logs in real-time (interactive mode)')
    .action(async (configFile: string, destination: string, options: {verbose?: boolean}, cmd: Command) => {
      const globals = getGlobalOptions(cmd)
      const settings = resolveSettings(globals)

      const engine = new DockerCliEngine(settings.dockerBinary)
      await engine.check()

      const validationClient = new HttpValidationClient({
        url: settings.validationUrl,
        timeoutMs: settings.validationTimeoutMs
      })
      const reporter = globals.json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const packager = new Packager(engine, validationClient, reporter)

      const result = await packager.run(configFile, destination)
      if (!result.ok) {
        if (globals.json) {
          console.error('Packaging failed:', result.error.message)
        }

        process.exitCode = 1
        return
      }

      if (globals.json) {
        console.log(JSON.stringify({tag: result.value.tag, destination: result.value.destination}))
      }
    })
}
