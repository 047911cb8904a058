import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { buildGraphHandler, statsHandler, visualizeHandler } from '../src/handlers/graph-handlers.js'
import { SNAPSHOT, arn, createTempDir } from './helpers.js'

describe('graph handlers', () => {
  let dir: string
  let cleanup: () => Promise<void>

  beforeEach(async () => {
    ;({ dir, cleanup } = await createTempDir())
  })

  afterEach(async () => {
    await cleanup()
  })

  describe('buildGraphHandler', () => {
    it('writes a graph that the other commands can load', async () => {
      const output = join(dir, 'nested', 'graph.json')
      const built = await buildGraphHandler({ input: SNAPSHOT, output })

      expect(built.success).toBe(true)
      if (!built.success) return
      expect(built.data.output).toBe(output)
      expect(built.data.stats).toMatchObject({ users: 2, groups: 1, roles: 1, managedPolicies: 3 })

      const stats = await statsHandler({ graphPath: output })
      expect(stats).toEqual({ success: true, data: { stats: built.data.stats } })
    })

    it('reports a missing snapshot file', async () => {
      const input = join(dir, 'missing.json')
      const result = await buildGraphHandler({ input, output: join(dir, 'graph.json') })

      expect(result).toEqual({ success: false, error: `Snapshot ${input} not found` })
    })

    it('reports a snapshot that is not JSON', async () => {
      const input = join(dir, 'broken.json')
      await writeFile(input, '{ not json', 'utf-8')
      const result = await buildGraphHandler({ input, output: join(dir, 'graph.json') })

      expect(result.success).toBe(false)
      if (result.success) return
      expect(result.error.startsWith(`Snapshot ${input} is not valid JSON:`)).toBe(true)
    })

    it('reports construction errors from the snapshot', async () => {
      const input = join(dir, 'dangling.json')
      await writeFile(
        input,
        JSON.stringify({ users: [{ arn: arn.alice, name: 'alice', groups: ['ghosts'] }] }),
        'utf-8'
      )
      const result = await buildGraphHandler({ input, output: join(dir, 'graph.json') })

      expect(result).toEqual({
        success: false,
        error: `Inconsistent snapshot at ${arn.alice}: group ghosts is not in the snapshot`,
      })
    })
  })

  describe('statsHandler', () => {
    it('counts nodes and edges of a snapshot built on the fly', async () => {
      const result = await statsHandler({ input: SNAPSHOT, graphPath: join(dir, 'unused.json') })

      expect(result).toEqual({
        success: true,
        data: {
          stats: {
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
          },
        },
      })
    })

    it('points at build-graph when the default graph is missing', async () => {
      const graphPath = join(dir, 'iam_graph.json')
      const result = await statsHandler({ graphPath })

      expect(result).toEqual({
        success: false,
        error: `Graph file ${graphPath} not found; run build-graph first or pass --input`,
      })
    })

    it('refuses --graph and --input together', async () => {
      const result = await statsHandler({ graph: 'a.json', input: SNAPSHOT, graphPath: 'b.json' })

      expect(result).toEqual({ success: false, error: 'Use either --graph or --input, not both' })
    })
  })

  describe('visualizeHandler', () => {
    const expectedDot = [
      'digraph "iam" {',
      '  rankdir=LR;',
      '  node [style=filled];',
      `  "${arn.bob}" [label="bob", shape=ellipse, fillcolor=lightblue];`,
      `  "${arn.deployer}" [label="deployer", shape=diamond, fillcolor=orange];`,
      `  "${arn.bob}" -> "${arn.deployer}" [label="trusts", style=dotted];`,
      '}',
      '',
    ].join('\n')

    it('renders the filtered neighborhood as DOT', async () => {
      const result = await visualizeHandler({
        input: SNAPSHOT,
        graphPath: join(dir, 'unused.json'),
        filter: ['bob'],
        includePolicies: false,
      })

      expect(result).toEqual({ success: true, data: { dot: expectedDot, nodes: 2, edges: 1 } })
    })

    it('writes the DOT file when an output path is given', async () => {
      const output = join(dir, 'graph.dot')
      const result = await visualizeHandler({
        input: SNAPSHOT,
        graphPath: join(dir, 'unused.json'),
        output,
        filter: ['bob'],
        includePolicies: false,
      })

      expect(result.success && result.data.output).toBe(output)
      expect(await readFile(output, 'utf-8')).toBe(expectedDot)
    })
  })
})
