import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Sink } from '@logtape/logtape'
import {
  ROOT_CATEGORY,
  validateEnvironment,
  validateLogLevel,
  type Environment,
  type LogLevel,
} from './constants.js'

/** Where sinks write. Defaults to stderr so stdout stays free for command output. */
export interface LogWriter {
  write(chunk: string): unknown
}

export interface LoggerConfig {
  level?: LogLevel
  environment?: Environment
  writer?: LogWriter
}

let configPromise: Promise<void> | null = null
let configured = false

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    // circular reference; retry marking cycles
    try {
      const seen = new WeakSet<object>()
      return JSON.stringify(value, (_key, val: unknown) => {
        if (typeof val === 'object' && val !== null) {
          if (seen.has(val)) return '[Circular]'
          seen.add(val)
        }
        return val
      })
    } catch {
      return String(value)
    }
  }
}

export function formatMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('')
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
}

const LEVEL_COLORS: Record<string, string> = {
  debug: ANSI.dim,
  info: ANSI.cyan,
  warning: ANSI.yellow,
  error: ANSI.red,
  fatal: ANSI.magenta,
}

export function createPrettySink(writer: LogWriter): Sink {
  return (record: LogRecord) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const color = LEVEL_COLORS[record.level] ?? ''
    const category = record.category.join('.')
    writer.write(
      `${ANSI.dim}${time}${ANSI.reset} ${color}${level}${ANSI.reset} ${ANSI.blue}${category}${ANSI.reset}: ${formatMessage(record)}\n`
    )
  }
}

export function createJsonSink(writer: LogWriter): Sink {
  return (record: LogRecord) => {
    const line = safeStringify({
      timestamp: record.timestamp,
      level: record.level,
      category: record.category.join('.'),
      message: formatMessage(record),
      ...(Object.keys(record.properties).length ? { properties: record.properties } : {}),
    })
    writer.write(line + '\n')
  }
}

/**
 * Configure LogTape: a colored line sink outside production, JSON lines in production.
 *
 * Safe to call multiple times; later calls are no-ops once configuration succeeds.
 */
export async function configureLogger(config?: LoggerConfig): Promise<void> {
  if (configured) return
  if (configPromise) return configPromise

  configPromise = doConfigureLogger(config)
    .then(() => {
      configured = true
    })
    .catch((err: unknown) => {
      configPromise = null
      throw err
    })
  return configPromise
}

async function doConfigureLogger(config?: LoggerConfig): Promise<void> {
  const level: LogLevel = config?.level ?? validateLogLevel(process.env.LOG_LEVEL) ?? 'info'
  const environment =
    config?.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'
  const writer = config?.writer ?? process.stderr

  const sinkName = environment === 'production' ? 'json' : 'pretty'
  const sink = environment === 'production' ? createJsonSink(writer) : createPrettySink(writer)

  await configure<string, string>({
    sinks: { [sinkName]: sink },
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: [sinkName] },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: [sinkName] },
    ],
  })
}

/**
 * @internal
 * Reset LogTape and the internal state so `configureLogger` can run again. For test
 * teardown only.
 */
export async function resetLogger(): Promise<void> {
  await reset()
  configPromise = null
  configured = false
}

export { getLogger }
