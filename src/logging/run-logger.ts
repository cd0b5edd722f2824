import path from 'node:path'

import { Logger } from 'tslog'

import type { LectureChaptersConfig, LoggingFormat, LoggingLevel } from '../config.js'
import { formatFileTimestamp } from '../time.js'
import type { LogFileWriter } from './log-file.js'
import { createLogFileWriter } from './log-file.js'

export type RunLogger = Logger<Record<string, unknown>>

export type RunLoggingConfig = {
  level: LoggingLevel
  format: LoggingFormat
  file: string
}

export type RunLogging = {
  logger: RunLogger
  config: RunLoggingConfig | null
  flush: () => Promise<void>
}

const DEFAULT_LOG_DIR = 'logs'
const DEFAULT_LOG_LEVEL: LoggingLevel = 'info'
const DEFAULT_LOG_FORMAT: LoggingFormat = 'pretty'
const PRETTY_TEMPLATE = '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}},{{ms}} - {{logLevelName}} - '

const LOG_LEVEL_MAP: Record<LoggingLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

export function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trimEnd()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' '))
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

/** `<dir>/<video name>_<YYYYMMDD_HHMMSS>.log` */
export function resolveRunLogPath({
  videoPath,
  dir,
  now,
  cwd,
}: {
  videoPath: string
  dir?: string | null
  now: Date
  cwd: string
}): string {
  const videoName = path.basename(videoPath, path.extname(videoPath))
  const logDir = path.resolve(cwd, dir ?? DEFAULT_LOG_DIR)
  return path.join(logDir, `${videoName}_${formatFileTimestamp(now)}.log`)
}

export function resolveRunLoggingConfig({
  config,
  videoPath,
  verbose,
  now,
  cwd,
}: {
  config: LectureChaptersConfig | null
  videoPath: string
  verbose: boolean
  now: Date
  cwd: string
}): RunLoggingConfig | null {
  const logging = config?.logging
  if (logging?.enabled === false) return null
  return {
    level: verbose ? 'debug' : (logging?.level ?? DEFAULT_LOG_LEVEL),
    format: logging?.format ?? DEFAULT_LOG_FORMAT,
    file: resolveRunLogPath({ videoPath, dir: logging?.dir, now, cwd }),
  }
}

/**
 * Process-wide run logger. Everything below the CLI receives this logger (or
 * a sub-logger) instead of configuring its own.
 */
export function createRunLogger(
  resolved: RunLoggingConfig | null,
  { mirror }: { mirror?: ((line: string) => void) | null } = {}
): RunLogging {
  if (!resolved) {
    return {
      logger: new Logger<Record<string, unknown>>({ name: 'lecture-chapters', type: 'hidden' }),
      config: null,
      flush: async () => {},
    }
  }

  const writer: LogFileWriter = createLogFileWriter(resolved.file)
  const baseSettings = {
    name: 'lecture-chapters',
    minLevel: LOG_LEVEL_MAP[resolved.level],
    hideLogPositionForProduction: true,
  }

  const logger =
    resolved.format === 'pretty'
      ? new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'pretty',
          prettyLogTemplate: PRETTY_TEMPLATE,
          stylePrettyLogs: false,
          overwrite: {
            transportFormatted: (metaMarkup, args, errors) => {
              const line = formatPrettyLine({ metaMarkup, args, errors })
              writer.write(line)
              mirror?.(line)
            },
          },
        })
      : new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'json',
          overwrite: {
            transportJSON: (json) => {
              const line = safeJsonStringify(json)
              writer.write(line)
              mirror?.(line)
            },
          },
        })

  return { logger, config: resolved, flush: writer.flush }
}
