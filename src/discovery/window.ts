import type { SearchWindow } from '../video/types.js'

/**
 * Window of `durationSeconds` centered on `centerSeconds`. When the naive
 * start falls below zero, the start is clamped to 0 and the lost span is
 * added to the far end.
 */
export function buildSearchWindow(centerSeconds: number, durationSeconds: number): SearchWindow {
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    throw new Error(`Search window must be positive, got ${durationSeconds}`)
  }
  const center = Math.max(0, centerSeconds)
  const naiveStart = center - durationSeconds / 2
  const lost = naiveStart < 0 ? -naiveStart : 0
  const startSeconds = Math.max(0, naiveStart)
  const scanned = durationSeconds + lost
  return {
    centerSeconds: center,
    requestedSeconds: durationSeconds,
    startSeconds,
    endSeconds: startSeconds + scanned,
    durationSeconds: scanned,
  }
}
