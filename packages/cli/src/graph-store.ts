import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import {
  buildGraph,
  deserializeGraph,
  serializeGraph,
  type PermissionGraph,
} from '@iam-explorer/core'
import { getLogger } from '@iam-explorer/telemetry'

const logger = getLogger(['iam-explorer', 'cli'])

export interface GraphLocation {
  graph?: string
  input?: string
  graphPath?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

async function readBytes(path: string, what: string, hint = ''): Promise<Buffer> {
  try {
    return await readFile(path)
  } catch (err) {
    if (isMissingFile(err)) throw new Error(`${what} ${path} not found${hint}`)
    throw err
  }
}

/**
 * Reads a snapshot file and builds the graph from it.
 */
export async function buildGraphFromFile(path: string): Promise<PermissionGraph> {
  const text = (await readBytes(path, 'Snapshot')).toString('utf-8')
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new Error(`Snapshot ${path} is not valid JSON: ${message}`)
  }
  logger.debug`building graph from snapshot ${path}`
  return buildGraph(json)
}

/**
 * Resolves the graph a command works on. `--input` rebuilds from a snapshot; otherwise the
 * serialized graph at `--graph` (or the configured path) is loaded.
 */
export async function loadGraph(location: GraphLocation): Promise<PermissionGraph> {
  if (location.graph && location.input) {
    throw new Error('Use either --graph or --input, not both')
  }
  if (location.input) return buildGraphFromFile(location.input)

  const path = location.graph ?? location.graphPath
  if (!path) throw new Error('No graph given; pass --graph or --input')
  const bytes = await readBytes(path, 'Graph file', '; run build-graph first or pass --input')
  logger.debug`loading serialized graph ${path}`
  return deserializeGraph(bytes)
}

export async function saveGraph(graph: PermissionGraph, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, serializeGraph(graph))
  logger.info`wrote graph to ${path}`
}
