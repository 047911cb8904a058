import { Command } from 'commander'
import chalk from 'chalk'
import type { ExplorerConfig } from '@iam-explorer/config'
import { visualizeHandler } from '../handlers/graph-handlers.js'
import { VisualizeInputSchema } from '../types.js'
import { fail, reportInvalidInput } from './options.js'

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function visualizeCommand(config: ExplorerConfig): Command {
  return new Command('visualize')
    .description('Render the relationship graph as Graphviz DOT')
    .option('--graph <file>', `Serialized graph (default: ${config.graphPath})`)
    .option('--input <file>', 'Snapshot JSON to build the graph from')
    .option('--output <file>', 'Write DOT to a file instead of stdout')
    .option('--filter <identity>', 'Only this identity and its neighbors (repeatable)', collect, [])
    .option('--no-policies', 'Leave out policy nodes and attachment edges')
    .action(
      async (options: {
        graph?: string
        input?: string
        output?: string
        filter?: string[]
        policies?: boolean
      }) => {
        const validation = VisualizeInputSchema.safeParse({
          graph: options.graph,
          input: options.input,
          output: options.output,
          filter: options.filter,
          includePolicies: options.policies,
          graphPath: config.graphPath,
        })
        if (!validation.success) reportInvalidInput(validation.error)

        const result = await visualizeHandler(validation.data)
        if (!result.success) fail(result.error)

        if (result.data.output) {
          console.log(
            chalk.green(
              `✓ Wrote ${result.data.nodes} nodes and ${result.data.edges} edges to ${result.data.output}`
            )
          )
        } else {
          process.stdout.write(result.data.dot)
        }
      }
    )
}
