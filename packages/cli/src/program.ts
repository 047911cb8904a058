import { Command } from 'commander'
import type { ExplorerConfig } from '@iam-explorer/config'
import { configureLogger, validateLogLevel } from '@iam-explorer/telemetry'
import { buildGraphCommand } from './commands/build-graph.js'
import { queryCommands } from './commands/query.js'
import { statsCommand } from './commands/stats.js'
import { visualizeCommand } from './commands/visualize.js'

export function createProgram(config: ExplorerConfig): Command {
  const program = new Command()

  program
    .name('iam-explorer')
    .description('Explore IAM permission graphs built from account snapshots')
    .version(process.env.VERSION || '0.0.0-dev')
    .option('--log-level <level>', 'Log level', config.logLevel)
    .hook('preAction', async (_program, actionCommand) => {
      const globals = actionCommand.optsWithGlobals()
      const requested = typeof globals.logLevel === 'string' ? globals.logLevel : undefined
      await configureLogger({
        level: validateLogLevel(requested) ?? config.logLevel,
        environment: config.environment,
      })
    })

  program.addCommand(buildGraphCommand(config))
  program.addCommand(queryCommands(config))
  program.addCommand(visualizeCommand(config))
  program.addCommand(statsCommand(config))

  return program
}
