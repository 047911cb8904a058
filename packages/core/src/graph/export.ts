import type { EdgeKind, IdentityKind } from '../model/types.js'
import { qualifiedName } from '../model/identity.js'
import type { PermissionGraph } from './permission-graph.js'

export type ExportNodeKind = IdentityKind | 'policy' | 'principal'

export interface ExportNode {
  id: string
  kind: ExportNodeKind
  label: string
}

export interface ExportEdge {
  kind: EdgeKind
  source: string
  target: string
}

export interface GraphExport {
  nodes: ExportNode[]
  edges: ExportEdge[]
}

export interface ExportOptions {
  /** Include policy nodes and `attached` edges. Defaults to true. */
  includePolicies?: boolean
  /**
   * Keep only the named identities (ARN, `kind/name` or bare name) and their direct
   * neighbors. Empty or absent keeps everything.
   */
  filter?: readonly string[]
}

/**
 * Nodes and edges for drawing the relationship diagram. No layout happens here.
 *
 * Trust principals that are not identities of the snapshot (services, other accounts,
 * `*`) become `principal` nodes.
 */
export function exportGraph(graph: PermissionGraph, options: ExportOptions = {}): GraphExport {
  const includePolicies = options.includePolicies ?? true
  const nodes = new Map<string, ExportNode>()

  for (const identity of graph.allIdentities()) {
    nodes.set(identity.id, { id: identity.id, kind: identity.kind, label: identity.name })
  }
  if (includePolicies) {
    for (const policy of graph.policies()) {
      nodes.set(policy.id, { id: policy.id, kind: 'policy', label: policy.name })
    }
    for (const identity of graph.allIdentities()) {
      for (const inline of identity.inlinePolicies) {
        nodes.set(inline.id, { id: inline.id, kind: 'policy', label: `${identity.name}/${inline.name}` })
      }
    }
  }

  const edges: ExportEdge[] = []
  for (const edge of graph.edges()) {
    if (edge.kind === 'attached' && !includePolicies) continue
    if (edge.kind === 'trusts' && !nodes.has(edge.source)) {
      nodes.set(edge.source, { id: edge.source, kind: 'principal', label: edge.source })
    }
    edges.push({ kind: edge.kind, source: edge.source, target: edge.target })
  }

  const filter = options.filter ?? []
  if (filter.length === 0) return { nodes: [...nodes.values()], edges }

  const wanted = new Set(filter)
  const focus = new Set(
    graph
      .identities()
      .filter((i) => wanted.has(i.id) || wanted.has(i.name) || wanted.has(qualifiedName(i)))
      .map((i) => i.id)
  )
  const keep = new Set(focus)
  for (const edge of edges) {
    if (focus.has(edge.source)) keep.add(edge.target)
    if (focus.has(edge.target)) keep.add(edge.source)
  }

  return {
    nodes: [...nodes.values()].filter((node) => keep.has(node.id)),
    edges: edges.filter((edge) => keep.has(edge.source) && keep.has(edge.target)),
  }
}
