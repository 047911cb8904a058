import type { EdgeKind, ExportNodeKind, GraphExport } from '@iam-explorer/core'

const NODE_STYLES: Record<ExportNodeKind, { shape: string; color: string }> = {
  user: { shape: 'ellipse', color: 'lightblue' },
  group: { shape: 'box', color: 'lightgreen' },
  role: { shape: 'diamond', color: 'orange' },
  policy: { shape: 'note', color: 'lightyellow' },
  principal: { shape: 'plaintext', color: 'lightgray' },
}

const EDGE_STYLES: Record<EdgeKind, string> = {
  member_of: 'solid',
  attached: 'dashed',
  trusts: 'dotted',
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/**
 * Graphviz DOT for an exported graph. Layout is left to Graphviz.
 */
export function toDot(graph: GraphExport, name = 'iam'): string {
  const lines = [`digraph ${quote(name)} {`, '  rankdir=LR;', '  node [style=filled];']
  for (const node of graph.nodes) {
    const { shape, color } = NODE_STYLES[node.kind]
    lines.push(`  ${quote(node.id)} [label=${quote(node.label)}, shape=${shape}, fillcolor=${color}];`)
  }
  for (const edge of graph.edges) {
    lines.push(
      `  ${quote(edge.source)} -> ${quote(edge.target)} [label=${quote(edge.kind)}, style=${EDGE_STYLES[edge.kind]}];`
    )
  }
  lines.push('}')
  return lines.join('\n') + '\n'
}
