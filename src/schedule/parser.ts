import type { Logger } from 'tslog'

import { ConfigurationError, ScheduleError } from '../errors.js'
import { parseDurationMinutes } from './duration.js'
import type { Lecture, LectureKind, LectureRange, LectureSelection, ScheduleRow } from './types.js'

type ScheduleLogger = Logger<Record<string, unknown>> | null | undefined

export function resolveLectureKind(rawType: string): LectureKind | 'section' {
  const normalized = rawType.trim().toLowerCase()
  if (normalized === 'section') return 'section'
  if (normalized === 'doc' || normalized === 'document') return 'document'
  if (normalized === 'video') return 'video'
  return 'other'
}

/**
 * Turns spreadsheet rows into lectures. Section rows open a new section and
 * produce no lecture; lecture numbers run across the whole schedule.
 */
export function parseScheduleRows(rows: ScheduleRow[], logger?: ScheduleLogger): Lecture[] {
  const lectures: Lecture[] = []
  let sectionNumber = 0
  let sequenceNumber = 0

  for (const [index, row] of rows.entries()) {
    const kind = resolveLectureKind(row.type)
    if (kind === 'section') {
      sectionNumber += 1
      logger?.debug(`Section ${sectionNumber}: ${row.title}`)
      continue
    }
    const title = row.title.trim()
    if (!title) {
      logger?.warn(`Skipping schedule row ${index + 1}: missing title`)
      continue
    }
    const duration = parseDurationMinutes(row.duration, logger)
    logger?.debug(`Duration "${String(row.duration ?? '')}" -> ${duration} minutes`)
    sequenceNumber += 1
    lectures.push({
      kind,
      title,
      estimatedDurationMinutes: duration,
      sequenceNumber,
      sectionNumber,
      estimatedStartMinutes: 0,
      estimatedEndMinutes: 0,
    })
  }

  logger?.info(`Parsed ${lectures.length} lectures in ${sectionNumber} sections`)
  return lectures
}

export function compareLectures(a: Lecture, b: Lecture): number {
  return a.sectionNumber - b.sectionNumber || a.sequenceNumber - b.sequenceNumber
}

/** Returns sorted copies with cumulative estimates starting at minute 0. */
export function calculateEstimatedTimes(lectures: readonly Lecture[]): Lecture[] {
  let cursor = 0
  return [...lectures].sort(compareLectures).map((lecture) => {
    const start = cursor
    cursor += lecture.estimatedDurationMinutes
    return { ...lecture, estimatedStartMinutes: start, estimatedEndMinutes: cursor }
  })
}

/**
 * Parses `a-b`, `a-`, `-b` or `a` (1-based, inclusive). A bare number selects
 * just that item.
 */
export function parseRange(raw: string, label = 'range'): LectureRange {
  const value = raw.trim()
  const match = /^(\d*)\s*(?:(-)\s*(\d*))?$/.exec(value)
  if (!value || !match) {
    throw new ConfigurationError(`Invalid ${label} "${raw}": use start-end, start-, -end or n`)
  }
  const [, startRaw = '', dash, endRaw = ''] = match
  if (!startRaw && !endRaw) {
    throw new ConfigurationError(`Invalid ${label} "${raw}": use start-end, start-, -end or n`)
  }
  const start = startRaw ? Number(startRaw) : null
  const end = endRaw ? Number(endRaw) : dash ? null : start
  if (start === 0 || end === 0) {
    throw new ConfigurationError(`Invalid ${label} "${raw}": numbers start at 1`)
  }
  if (start !== null && end !== null && end < start) {
    throw new ConfigurationError(`Invalid ${label} "${raw}": end is before start`)
  }
  return { start, end }
}

function inRange(value: number, range: LectureRange): boolean {
  if (range.start !== null && value < range.start) return false
  if (range.end !== null && value > range.end) return false
  return true
}

export function selectLectures(lectures: readonly Lecture[], selection: LectureSelection): Lecture[] {
  const sorted = [...lectures].sort(compareLectures)
  if (selection.kind === 'all') return sorted
  const selected =
    selection.kind === 'lectures'
      ? sorted.filter((lecture) => inRange(lecture.sequenceNumber, selection.range))
      : sorted.filter((lecture) => inRange(lecture.sectionNumber, selection.range))
  if (selected.length === 0) {
    const noun = selection.kind === 'lectures' ? 'lecture' : 'section'
    throw new ScheduleError(`No lectures found for ${noun} range ${describeRange(selection.range)}`)
  }
  return selected
}

export function describeRange(range: LectureRange): string {
  if (range.start !== null && range.start === range.end) return String(range.start)
  return `${range.start ?? ''}-${range.end ?? ''}`
}
