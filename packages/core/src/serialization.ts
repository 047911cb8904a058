import { z } from 'zod'
import { InvalidGraphDataError, isIamExplorerError } from './errors.js'
import { buildGraph } from './graph/build.js'
import type { PermissionGraph } from './graph/permission-graph.js'
import { formatIssues } from './model/schema.js'

export const GRAPH_FORMAT = 'iam-explorer-graph'
export const GRAPH_FORMAT_VERSION = 1

const SerializedGraphSchema = z.object({
  format: z.literal(GRAPH_FORMAT),
  version: z.literal(GRAPH_FORMAT_VERSION),
  snapshot: z.unknown(),
})

/**
 * Encodes the graph as UTF-8 JSON. Only the validated snapshot is stored; links, indexes
 * and edges are derived again on load.
 */
export function serializeGraph(graph: PermissionGraph): Uint8Array {
  const payload = {
    format: GRAPH_FORMAT,
    version: GRAPH_FORMAT_VERSION,
    snapshot: graph.snapshot,
  }
  return new TextEncoder().encode(JSON.stringify(payload, null, 2))
}

/**
 * Rebuilds a graph written by {@link serializeGraph}. The stored snapshot goes through the
 * same validation as a fresh build.
 *
 * @throws InvalidGraphDataError when the bytes are not a serialized graph of this version,
 * or when the snapshot inside fails to build.
 */
export function deserializeGraph(bytes: Uint8Array): PermissionGraph {
  let text: string
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch {
    throw new InvalidGraphDataError('payload is not valid UTF-8')
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    throw new InvalidGraphDataError(`payload is not JSON (${err instanceof Error ? err.message : String(err)})`)
  }

  const parsed = SerializedGraphSchema.safeParse(json)
  if (!parsed.success) throw new InvalidGraphDataError(formatIssues(parsed.error))

  try {
    return buildGraph(parsed.data.snapshot)
  } catch (err) {
    if (isIamExplorerError(err)) throw new InvalidGraphDataError(err.message)
    throw err
  }
}
