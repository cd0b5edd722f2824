import type { Logger } from 'tslog'

const HOUR_PATTERN = /(\d+)\s*hr?/
const MINUTE_PATTERN = /(\d+)\s*min/
const NUMBER_PATTERN = /\d+/

/**
 * Best-effort duration parsing into whole minutes.
 *
 * Accepts "2hr", "90 min", "1hr 30min" (summed) and bare numbers (minutes).
 * When the text contains `|`, only the part after the last `|` is read.
 */
export function parseDurationMinutes(
  raw: string | number | null | undefined,
  logger?: Logger<Record<string, unknown>> | null
): number {
  if (raw == null) return 0
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw > 0 ? Math.trunc(raw) : 0
  }

  let text = raw.trim().toLowerCase()
  if (!text) return 0
  if (text.includes('|')) {
    text = (text.split('|').pop() ?? '').trim()
  }

  let total = 0
  const hours = HOUR_PATTERN.exec(text)
  if (hours?.[1]) total += Number(hours[1]) * 60
  const minutes = MINUTE_PATTERN.exec(text)
  if (minutes?.[1]) total += Number(minutes[1])

  if (total === 0) {
    const bare = NUMBER_PATTERN.exec(text)
    if (bare) total = Number(bare[0])
  }

  if (total === 0) {
    logger?.warn(`Unable to parse duration "${raw}", using 0 minutes`)
  }
  return total
}
