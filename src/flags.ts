import { ConfigurationError } from './errors.js'

const WINDOW_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>s|m)?$/i
const INTEGER_PATTERN = /^\d+$/
const NUMBER_PATTERN = /^\d+(?:\.\d+)?$/
const MAX_WINDOW_SECONDS = 86_400
const MAX_FPS = 60
const MIN_WORKERS = 1
const MAX_WORKERS = 16

/** Window width in seconds; accepts a bare number or an `s`/`m` suffix (`90`, `90s`, `2m`). */
export function parseWindowSeconds(raw: string): number {
  const match = WINDOW_PATTERN.exec(raw.trim())
  if (!match?.groups) {
    throw new ConfigurationError(`Unsupported --window: ${raw}`)
  }
  const numeric = Number(match.groups.value)
  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const seconds = unit === 'm' ? numeric * 60 : numeric
  if (!Number.isFinite(seconds) || seconds <= 0 || seconds > MAX_WINDOW_SECONDS) {
    throw new ConfigurationError(`Unsupported --window: ${raw} (range 0-${MAX_WINDOW_SECONDS}s)`)
  }
  return seconds
}

export function parseTruncate(raw: string): number {
  const normalized = raw.trim()
  if (!INTEGER_PATTERN.test(normalized) || Number(normalized) < 1) {
    throw new ConfigurationError(`Unsupported --truncate: ${raw} (expected a positive integer)`)
  }
  return Number(normalized)
}

export function parseFps(raw: string): number {
  const normalized = raw.trim()
  const numeric = NUMBER_PATTERN.test(normalized) ? Number(normalized) : Number.NaN
  if (!Number.isFinite(numeric) || numeric <= 0 || numeric > MAX_FPS) {
    throw new ConfigurationError(`Unsupported --fps: ${raw} (range 0-${MAX_FPS})`)
  }
  return numeric
}

export function parseWorkers(raw: string): number {
  const normalized = raw.trim()
  const numeric = INTEGER_PATTERN.test(normalized) ? Number(normalized) : Number.NaN
  if (!Number.isInteger(numeric) || numeric < MIN_WORKERS || numeric > MAX_WORKERS) {
    throw new ConfigurationError(
      `Unsupported --workers: ${raw} (range ${MIN_WORKERS}-${MAX_WORKERS})`
    )
  }
  return numeric
}

/**
 * `HH:MM:SS` (each part may carry decimals) to seconds. Returns null for
 * anything else so the caller can ask again.
 */
export function parseManualTimestamp(raw: string): number | null {
  const parts = raw.trim().split(':')
  if (parts.length !== 3) return null
  const values: number[] = []
  for (const part of parts) {
    const normalized = part.trim()
    if (!NUMBER_PATTERN.test(normalized)) return null
    values.push(Number(normalized))
  }
  const [hours = 0, minutes = 0, seconds = 0] = values
  return hours * 3600 + minutes * 60 + seconds
}
