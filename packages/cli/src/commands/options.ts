import { Command } from 'commander'
import chalk from 'chalk'
import type { ZodError } from 'zod'
import type { ExplorerConfig } from '@iam-explorer/config'

/** Adds the graph source and output format options shared by the read-only commands. */
export function withGraphSource(command: Command, config: ExplorerConfig): Command {
  return command
    .option('--graph <file>', `Serialized graph (default: ${config.graphPath})`)
    .option('--input <file>', 'Snapshot JSON to build the graph from')
    .option('--format <format>', 'Output format (table|json)', config.format)
}

export function reportInvalidInput(error: ZodError): never {
  console.error(chalk.red('Invalid input:'))
  error.issues.forEach((issue) => {
    console.error(chalk.yellow(`- ${issue.path.join('.')}: ${issue.message}`))
  })
  process.exit(1)
}

export function fail(message: string): never {
  console.error(chalk.red(`✗ ${message}`))
  process.exit(1)
}

export function printWarnings(lines: string[]): void {
  for (const line of lines) console.error(chalk.yellow(line))
}
