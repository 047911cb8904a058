import { Command } from 'commander'
import type { ExplorerConfig } from '@iam-explorer/config'
import { statsHandler } from '../handlers/graph-handlers.js'
import { statsRows } from '../render/output.js'
import { StatsInputSchema } from '../types.js'
import { fail, reportInvalidInput, withGraphSource } from './options.js'

export function statsCommand(config: ExplorerConfig): Command {
  return withGraphSource(new Command('stats'), config)
    .description('Count nodes and edges by kind')
    .action(async (options: { graph?: string; input?: string; format?: string }) => {
      const validation = StatsInputSchema.safeParse({ ...options, graphPath: config.graphPath })
      if (!validation.success) reportInvalidInput(validation.error)

      const result = await statsHandler(validation.data)
      if (!result.success) fail(result.error)

      if (validation.data.format === 'json') {
        console.log(JSON.stringify(result.data.stats, null, 2))
      } else {
        console.table(statsRows(result.data.stats))
      }
    })
}
