import { afterEach, describe, expect, it, vi } from 'vitest'
import { ZodError } from 'zod'
import { ExplorerConfigSchema, OutputFormatSchema, loadDefaultConfig } from '../src/index.js'

describe('ExplorerConfigSchema', () => {
  it('fills every default', () => {
    expect(ExplorerConfigSchema.parse({})).toEqual({
      graphPath: 'iam_graph.json',
      format: 'table',
      logLevel: 'info',
      environment: 'development',
    })
  })

  it('rejects an empty graph path', () => {
    expect(ExplorerConfigSchema.safeParse({ graphPath: '' }).success).toBe(false)
  })

  it('rejects unknown log levels', () => {
    expect(ExplorerConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false)
  })
})

describe('OutputFormatSchema', () => {
  it('accepts table and json only', () => {
    expect(OutputFormatSchema.safeParse('table').success).toBe(true)
    expect(OutputFormatSchema.safeParse('json').success).toBe(true)
    expect(OutputFormatSchema.safeParse('csv').success).toBe(false)
  })
})

describe('loadDefaultConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('reads overrides from the environment', () => {
    vi.stubEnv('IAM_EXPLORER_GRAPH', '/tmp/account.json')
    vi.stubEnv('IAM_EXPLORER_FORMAT', 'json')
    vi.stubEnv('LOG_LEVEL', 'debug')
    vi.stubEnv('NODE_ENV', 'production')

    expect(loadDefaultConfig()).toEqual({
      graphPath: '/tmp/account.json',
      format: 'json',
      logLevel: 'debug',
      environment: 'production',
    })
  })

  it('treats empty variables as unset', () => {
    vi.stubEnv('IAM_EXPLORER_GRAPH', '')
    vi.stubEnv('IAM_EXPLORER_FORMAT', '')
    vi.stubEnv('LOG_LEVEL', '')
    vi.stubEnv('NODE_ENV', '')

    expect(loadDefaultConfig()).toEqual({
      graphPath: 'iam_graph.json',
      format: 'table',
      logLevel: 'info',
      environment: 'development',
    })
  })

  it('throws on an invalid output format', () => {
    vi.stubEnv('IAM_EXPLORER_FORMAT', 'xml')

    expect(() => loadDefaultConfig()).toThrow(ZodError)
  })
})
