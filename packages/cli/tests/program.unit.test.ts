import { describe, expect, it } from 'vitest'
import { ExplorerConfigSchema } from '@iam-explorer/config'
import { createProgram } from '../src/program.js'

describe('createProgram', () => {
  const program = createProgram(ExplorerConfigSchema.parse({ graphPath: 'account.json', format: 'json' }))

  it('registers every command', () => {
    expect(program.commands.map((c) => c.name())).toEqual(['build-graph', 'query', 'visualize', 'stats'])
    const query = program.commands.find((c) => c.name() === 'query')
    expect(query?.commands.map((c) => c.name())).toEqual(['who-can-do', 'what-can-do'])
  })

  it('takes option defaults from the configuration', () => {
    const stats = program.commands.find((c) => c.name() === 'stats')
    const build = program.commands.find((c) => c.name() === 'build-graph')

    expect(stats?.opts()).toEqual({ format: 'json' })
    expect(build?.opts()).toEqual({ output: 'account.json' })
  })
})
