import {
  QueryEngine,
  type QueryFailure,
  type WhatCanDoResult,
  type WhoCanDoResult,
} from '@iam-explorer/core'
import { loadGraph } from '../graph-store.js'
import type { CliResult, WhatCanDoInput, WhoCanDoInput } from '../types.js'

export type WhoCanDoCliResult = CliResult<WhoCanDoResult>
export type WhatCanDoCliResult = CliResult<WhatCanDoResult>

function describeFailure(failure: QueryFailure): string {
  return `${failure.code}: ${failure.message}`
}

/**
 * List identities that can perform an action, directly or through assumable roles
 */
export async function whoCanDoHandler(input: WhoCanDoInput): Promise<WhoCanDoCliResult> {
  try {
    const engine = new QueryEngine(await loadGraph(input))
    const result = engine.whoCanDo(input.action, input.resource)
    if (!result.success) return { success: false, error: describeFailure(result.error) }
    return { success: true, data: result.data }
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) }
  }
}

/**
 * List every permission an identity holds, with how it got it
 */
export async function whatCanDoHandler(input: WhatCanDoInput): Promise<WhatCanDoCliResult> {
  try {
    const engine = new QueryEngine(await loadGraph(input))
    const result = engine.whatCanDo(input.identity)
    if (!result.success) return { success: false, error: describeFailure(result.error) }
    return { success: true, data: result.data }
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) }
  }
}
