import { z } from 'zod'
import { OutputFormatSchema } from '@iam-explorer/config'

export type CliResult<T> = { success: true; data: T } | { success: false; error: string }

/**
 * Where a command gets its graph: a serialized graph (`--graph`), a raw snapshot that is
 * built on the fly (`--input`), or the configured default graph path.
 */
export const GraphSourceSchema = z.object({
  graph: z.string().min(1).optional(),
  input: z.string().min(1).optional(),
  graphPath: z.string().min(1),
})
export type GraphSource = z.infer<typeof GraphSourceSchema>

export const BuildGraphInputSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
})
export type BuildGraphInput = z.infer<typeof BuildGraphInputSchema>

export const WhoCanDoInputSchema = GraphSourceSchema.extend({
  action: z.string(),
  resource: z.string().default('*'),
  format: OutputFormatSchema,
})
export type WhoCanDoInput = z.infer<typeof WhoCanDoInputSchema>

export const WhatCanDoInputSchema = GraphSourceSchema.extend({
  identity: z.string().min(1),
  format: OutputFormatSchema,
})
export type WhatCanDoInput = z.infer<typeof WhatCanDoInputSchema>

export const VisualizeInputSchema = GraphSourceSchema.extend({
  output: z.string().min(1).optional(),
  filter: z.array(z.string().min(1)).default([]),
  includePolicies: z.boolean().default(true),
})
export type VisualizeInput = z.infer<typeof VisualizeInputSchema>

export const StatsInputSchema = GraphSourceSchema.extend({
  format: OutputFormatSchema,
})
export type StatsInput = z.infer<typeof StatsInputSchema>
