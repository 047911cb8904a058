import { describe, expect, it } from 'vitest'
import { toDot } from '../src/render/dot.js'
import { statsRows } from '../src/render/output.js'

describe('toDot', () => {
  it('escapes quotes and backslashes in identifiers and labels', () => {
    const dot = toDot({ nodes: [{ id: 'a"b', kind: 'principal', label: 'x\\y' }], edges: [] }, 'test')

    expect(dot.split('\n')).toEqual([
      'digraph "test" {',
      '  rankdir=LR;',
      '  node [style=filled];',
      '  "a\\"b" [label="x\\\\y", shape=plaintext, fillcolor=lightgray];',
      '}',
      '',
    ])
  })

  it('styles edges by kind', () => {
    const dot = toDot({
      nodes: [],
      edges: [
        { kind: 'member_of', source: 'u', target: 'g' },
        { kind: 'attached', source: 'g', target: 'p' },
      ],
    })

    expect(dot).toContain('  "u" -> "g" [label="member_of", style=solid];\n')
    expect(dot).toContain('  "g" -> "p" [label="attached", style=dashed];\n')
  })
})

describe('statsRows', () => {
  it('lists counts in a fixed order', () => {
    const rows = statsRows({
      totalNodes: 8,
      totalEdges: 6,
      users: 2,
      groups: 1,
      roles: 1,
      managedPolicies: 3,
      inlinePolicies: 1,
      memberships: 1,
      attachments: 4,
      trusts: 1,
    })

    expect(rows.map((row) => row.Kind)).toEqual([
      'users',
      'groups',
      'roles',
      'managed policies',
      'inline policies',
      'member_of edges',
      'attached edges',
      'trusts edges',
      'total nodes',
      'total edges',
    ])
    expect(rows[0]).toEqual({ Kind: 'users', Count: 2 })
  })
})
