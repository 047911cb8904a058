import { writeFile } from 'node:fs/promises'
import { exportGraph, type GraphStats } from '@iam-explorer/core'
import { buildGraphFromFile, loadGraph, saveGraph } from '../graph-store.js'
import { toDot } from '../render/dot.js'
import type { BuildGraphInput, CliResult, GraphSource, VisualizeInput } from '../types.js'

export type BuildGraphResult = CliResult<{ output: string; stats: GraphStats }>
export type StatsResult = CliResult<{ stats: GraphStats }>
export type VisualizeResult = CliResult<{ dot: string; output?: string; nodes: number; edges: number }>

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Validate a snapshot, build the graph and write it serialized
 */
export async function buildGraphHandler(input: BuildGraphInput): Promise<BuildGraphResult> {
  try {
    const graph = await buildGraphFromFile(input.input)
    await saveGraph(graph, input.output)
    return { success: true, data: { output: input.output, stats: graph.stats() } }
  } catch (error) {
    return { success: false, error: errorMessage(error) }
  }
}

export async function statsHandler(input: GraphSource): Promise<StatsResult> {
  try {
    const graph = await loadGraph(input)
    return { success: true, data: { stats: graph.stats() } }
  } catch (error) {
    return { success: false, error: errorMessage(error) }
  }
}

/**
 * Render the relationship graph as Graphviz DOT, written to `output` when given
 */
export async function visualizeHandler(input: VisualizeInput): Promise<VisualizeResult> {
  try {
    const graph = await loadGraph(input)
    const exported = exportGraph(graph, {
      includePolicies: input.includePolicies,
      filter: input.filter,
    })
    const dot = toDot(exported)
    if (input.output) await writeFile(input.output, dot, 'utf-8')
    return {
      success: true,
      data: {
        dot,
        ...(input.output ? { output: input.output } : {}),
        nodes: exported.nodes.length,
        edges: exported.edges.length,
      },
    }
  } catch (error) {
    return { success: false, error: errorMessage(error) }
  }
}
