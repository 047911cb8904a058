import { z } from 'zod'
import { VALID_ENVIRONMENTS, VALID_LOG_LEVELS } from '@iam-explorer/telemetry'

export const OutputFormatSchema = z.enum(['table', 'json'])

export type OutputFormat = z.infer<typeof OutputFormatSchema>

/**
 * Settings shared by every command. Command-line flags override these per invocation.
 */
export const ExplorerConfigSchema = z.object({
  /** Serialized graph read by the query commands and written by `build-graph`. */
  graphPath: z.string().min(1).default('iam_graph.json'),
  format: OutputFormatSchema.default('table'),
  logLevel: z.enum(VALID_LOG_LEVELS).default('info'),
  environment: z.enum(VALID_ENVIRONMENTS).default('development'),
})

export type ExplorerConfig = z.infer<typeof ExplorerConfigSchema>

/**
 * Loads the default configuration from environment variables.
 *
 * Empty variables count as unset. Invalid values throw a `ZodError`.
 */
export function loadDefaultConfig(): ExplorerConfig {
  return ExplorerConfigSchema.parse({
    graphPath: process.env.IAM_EXPLORER_GRAPH || undefined,
    format: process.env.IAM_EXPLORER_FORMAT || undefined,
    logLevel: process.env.LOG_LEVEL || undefined,
    environment: process.env.NODE_ENV || undefined,
  })
}
