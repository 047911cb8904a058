import { Command } from 'commander'
import chalk from 'chalk'
import type { ExplorerConfig } from '@iam-explorer/config'
import { buildGraphHandler } from '../handlers/graph-handlers.js'
import { BuildGraphInputSchema } from '../types.js'
import { fail, reportInvalidInput } from './options.js'

export function buildGraphCommand(config: ExplorerConfig): Command {
  return new Command('build-graph')
    .description('Validate a snapshot and write the serialized permission graph')
    .requiredOption('--input <file>', 'Snapshot JSON produced by the fetch step')
    .option('--output <file>', 'Where to write the graph', config.graphPath)
    .action(async (options: { input?: string; output?: string }) => {
      const validation = BuildGraphInputSchema.safeParse(options)
      if (!validation.success) reportInvalidInput(validation.error)

      const result = await buildGraphHandler(validation.data)
      if (!result.success) fail(`Failed to build graph: ${result.error}`)

      const { stats, output } = result.data
      console.log(
        chalk.green(
          `✓ Graph written to ${output} (${stats.users} users, ${stats.groups} groups, ${stats.roles} roles, ${stats.managedPolicies} policies)`
        )
      )
    })
}
