import { Command } from 'commander'
import chalk from 'chalk'
import type { ExplorerConfig } from '@iam-explorer/config'
import { whatCanDoHandler, whoCanDoHandler } from '../handlers/query-handlers.js'
import {
  assumableRoleRows,
  warningLines,
  whatCanDoRows,
  whoCanDoRows,
} from '../render/output.js'
import { WhatCanDoInputSchema, WhoCanDoInputSchema } from '../types.js'
import { fail, printWarnings, reportInvalidInput, withGraphSource } from './options.js'

interface SourceOptions {
  graph?: string
  input?: string
  format?: string
}

export function queryCommands(config: ExplorerConfig): Command {
  const query = new Command('query').description('Ask who can do what')

  query.addCommand(
    withGraphSource(new Command('who-can-do'), config)
      .description('List identities allowed to perform an action')
      .argument('<action>', 'Action pattern, e.g. s3:GetObject or iam:*')
      .option('--resource <pattern>', 'Resource pattern', '*')
      .action(async (action: string, options: SourceOptions & { resource?: string }) => {
        const validation = WhoCanDoInputSchema.safeParse({
          ...options,
          action,
          graphPath: config.graphPath,
        })
        if (!validation.success) reportInvalidInput(validation.error)

        const result = await whoCanDoHandler(validation.data)
        if (!result.success) fail(result.error)

        if (validation.data.format === 'json') {
          console.log(JSON.stringify(result.data, null, 2))
          return
        }
        if (result.data.records.length === 0) {
          console.log(chalk.yellow(`No identity can perform ${action} on ${validation.data.resource}.`))
        } else {
          console.table(whoCanDoRows(result.data))
        }
        printWarnings(warningLines(result.data.warnings))
      })
  )

  query.addCommand(
    withGraphSource(new Command('what-can-do'), config)
      .description('List the permissions of an identity, including assumable roles')
      .argument('<identity>', 'ARN, kind/name (user/alice) or unique name')
      .action(async (identity: string, options: SourceOptions) => {
        const validation = WhatCanDoInputSchema.safeParse({
          ...options,
          identity,
          graphPath: config.graphPath,
        })
        if (!validation.success) reportInvalidInput(validation.error)

        const result = await whatCanDoHandler(validation.data)
        if (!result.success) fail(result.error)

        if (validation.data.format === 'json') {
          console.log(JSON.stringify(result.data, null, 2))
          return
        }
        const { identity: subject } = result.data
        console.log(chalk.bold(`${subject.kind}/${subject.name}`))
        if (result.data.permissions.length === 0) {
          console.log(chalk.yellow('No permissions found.'))
        } else {
          console.table(whatCanDoRows(result.data))
        }
        if (result.data.assumableRoles.length > 0) {
          console.log(chalk.bold('Assumable roles'))
          console.table(assumableRoleRows(result.data))
        }
        printWarnings(warningLines(result.data.warnings))
      })
  )

  return query
}
