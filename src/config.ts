import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

import { ConfigurationError } from './errors.js'
import type { CropRegion } from './ocr/types.js'

export type LoggingLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggingFormat = 'json' | 'pretty'
export type LoggingConfig = {
  enabled?: boolean
  level?: LoggingLevel
  format?: LoggingFormat
  /** Directory for per-run log files (default: ./logs). */
  dir?: string
}

export type ToolsConfig = {
  ffmpeg?: string
  ffprobe?: string
  tesseract?: string
}

export type SearchConfig = {
  windowSeconds?: number
  fps?: number
  crop?: CropRegion
  truncate?: number
  stripPrefix?: boolean
  /** Concurrent OCR processes per search (1-16). */
  workers?: number
}

export type OcrConfig = {
  /** Tesseract language code(s), e.g. "eng" or "eng+ita". */
  language?: string
  /** Tesseract page segmentation mode (0-13). */
  psm?: number
}

export type LectureChaptersConfig = {
  tools?: ToolsConfig
  search?: SearchConfig
  ocr?: OcrConfig
  logging?: LoggingConfig
  output?: {
    csv?: string
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalid(path: string, message: string): ConfigurationError {
  return new ConfigurationError(`Invalid config file ${path}: ${message}`)
}

function readSection(
  parsed: Record<string, unknown>,
  key: string,
  path: string
): Record<string, unknown> | undefined {
  const value = parsed[key]
  if (typeof value === 'undefined') return undefined
  if (!isRecord(value)) throw invalid(path, `"${key}" must be an object.`)
  return value
}

function optionalString(raw: unknown, path: string, label: string): string | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'string') throw invalid(path, `"${label}" must be a string.`)
  const trimmed = raw.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function optionalNumber(
  raw: unknown,
  path: string,
  label: string,
  { min, max, integer = false }: { min: number; max: number; integer?: boolean }
): number | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'number' || !Number.isFinite(raw) || (integer && !Number.isInteger(raw))) {
    throw invalid(path, `"${label}" must be ${integer ? 'an integer' : 'a number'}.`)
  }
  if (raw < min || raw > max) {
    throw invalid(path, `"${label}" must be between ${min} and ${max}.`)
  }
  return raw
}

function optionalBoolean(raw: unknown, path: string, label: string): boolean | undefined {
  if (typeof raw === 'undefined') return undefined
  if (typeof raw !== 'boolean') throw invalid(path, `"${label}" must be a boolean.`)
  return raw
}

function parseLoggingLevel(raw: unknown, path: string): LoggingLevel | undefined {
  if (typeof raw === 'undefined') return undefined
  const trimmed = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (trimmed === 'debug' || trimmed === 'info' || trimmed === 'warn' || trimmed === 'error') {
    return trimmed
  }
  throw invalid(path, `"logging.level" must be one of "debug", "info", "warn", "error".`)
}

function parseLoggingFormat(raw: unknown, path: string): LoggingFormat | undefined {
  if (typeof raw === 'undefined') return undefined
  const trimmed = typeof raw === 'string' ? raw.trim().toLowerCase() : ''
  if (trimmed === 'json' || trimmed === 'pretty') return trimmed
  throw invalid(path, `"logging.format" must be one of "json" or "pretty".`)
}

function parseCrop(raw: unknown, path: string): CropRegion | undefined {
  if (typeof raw === 'undefined') return undefined
  const values = Array.isArray(raw)
    ? raw
    : isRecord(raw)
      ? [raw.left, raw.top, raw.right, raw.bottom]
      : null
  if (!values || values.length !== 4) {
    throw invalid(path, `"search.crop" must be [left, top, right, bottom] percentages.`)
  }
  const numbers = values.map((value: unknown, index) => {
    const parsed = optionalNumber(value, path, `search.crop[${index}]`, { min: 0, max: 100 })
    if (parsed === undefined) {
      throw invalid(path, `"search.crop" must be [left, top, right, bottom] percentages.`)
    }
    return parsed
  })
  const [left, top, right, bottom] = [numbers[0], numbers[1], numbers[2], numbers[3]]
  if (left >= right || top >= bottom) {
    throw invalid(path, `"search.crop" right/bottom must be greater than left/top.`)
  }
  return { left, top, right, bottom }
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const explicit = env.LECTURE_CHAPTERS_CONFIG?.trim()
  if (explicit) return explicit
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.lecture-chapters', 'config.json')
}

export function parseLectureChaptersConfig(raw: string, path: string): LectureChaptersConfig {
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Invalid JSON in config file ${path}: ${message}`)
  }
  if (!isRecord(parsed)) {
    throw invalid(path, 'expected an object at the top level')
  }

  const tools = (() => {
    const value = readSection(parsed, 'tools', path)
    if (!value) return undefined
    const ffmpeg = optionalString(value.ffmpeg, path, 'tools.ffmpeg')
    const ffprobe = optionalString(value.ffprobe, path, 'tools.ffprobe')
    const tesseract = optionalString(value.tesseract, path, 'tools.tesseract')
    return ffmpeg || ffprobe || tesseract
      ? {
          ...(ffmpeg ? { ffmpeg } : {}),
          ...(ffprobe ? { ffprobe } : {}),
          ...(tesseract ? { tesseract } : {}),
        }
      : undefined
  })()

  const search = (() => {
    const value = readSection(parsed, 'search', path)
    if (!value) return undefined
    const windowSeconds = optionalNumber(value.windowSeconds, path, 'search.windowSeconds', {
      min: 1,
      max: 86_400,
    })
    const fps = optionalNumber(value.fps, path, 'search.fps', { min: 0.01, max: 60 })
    const crop = parseCrop(value.crop, path)
    const truncate = optionalNumber(value.truncate, path, 'search.truncate', {
      min: 1,
      max: 10_000,
      integer: true,
    })
    const stripPrefix = optionalBoolean(value.stripPrefix, path, 'search.stripPrefix')
    const workers = optionalNumber(value.workers, path, 'search.workers', {
      min: 1,
      max: 16,
      integer: true,
    })
    const result: SearchConfig = {
      ...(typeof windowSeconds === 'number' ? { windowSeconds } : {}),
      ...(typeof fps === 'number' ? { fps } : {}),
      ...(crop ? { crop } : {}),
      ...(typeof truncate === 'number' ? { truncate } : {}),
      ...(typeof stripPrefix === 'boolean' ? { stripPrefix } : {}),
      ...(typeof workers === 'number' ? { workers } : {}),
    }
    return Object.keys(result).length > 0 ? result : undefined
  })()

  const ocr = (() => {
    const value = readSection(parsed, 'ocr', path)
    if (!value) return undefined
    const language = optionalString(value.language, path, 'ocr.language')
    const psm = optionalNumber(value.psm, path, 'ocr.psm', { min: 0, max: 13, integer: true })
    return language || typeof psm === 'number'
      ? { ...(language ? { language } : {}), ...(typeof psm === 'number' ? { psm } : {}) }
      : undefined
  })()

  const logging = (() => {
    const value = readSection(parsed, 'logging', path)
    if (!value) return undefined
    const enabled = optionalBoolean(value.enabled, path, 'logging.enabled')
    const level = parseLoggingLevel(value.level, path)
    const format = parseLoggingFormat(value.format, path)
    const dir = optionalString(value.dir, path, 'logging.dir')
    return typeof enabled === 'boolean' || level || format || dir
      ? {
          ...(typeof enabled === 'boolean' ? { enabled } : {}),
          ...(level ? { level } : {}),
          ...(format ? { format } : {}),
          ...(dir ? { dir } : {}),
        }
      : undefined
  })()

  const output = (() => {
    const value = readSection(parsed, 'output', path)
    if (!value) return undefined
    const csv = optionalString(value.csv, path, 'output.csv')
    return csv ? { csv } : undefined
  })()

  return {
    ...(tools ? { tools } : {}),
    ...(search ? { search } : {}),
    ...(ocr ? { ocr } : {}),
    ...(logging ? { logging } : {}),
    ...(output ? { output } : {}),
  }
}

export function loadLectureChaptersConfig({ env }: { env: Record<string, string | undefined> }): {
  config: LectureChaptersConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }
  return { config: parseLectureChaptersConfig(raw, path), path }
}
