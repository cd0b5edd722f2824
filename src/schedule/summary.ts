import { formatMinutesAsClock } from '../time.js'
import type { Lecture } from './types.js'

const TITLE_WIDTH = 43

export function formatScheduleSummary(lectures: readonly Lecture[]): string {
  if (lectures.length === 0) return 'No lectures found'

  const lines = [
    'S.## L.## Start       End         Title                                       Duration',
    '-'.repeat(95),
  ]
  let totalMinutes = 0
  for (const lecture of lectures) {
    totalMinutes += lecture.estimatedDurationMinutes
    const title =
      lecture.title.length > 40 ? `${lecture.title.slice(0, 40)}...` : lecture.title.padEnd(TITLE_WIDTH)
    const section = String(lecture.sectionNumber).padStart(2)
    const number = String(lecture.sequenceNumber).padStart(2)
    const start = formatMinutesAsClock(lecture.estimatedStartMinutes)
    const end = formatMinutesAsClock(lecture.estimatedEndMinutes)
    const duration = String(Math.round(lecture.estimatedDurationMinutes)).padStart(3)
    lines.push(`${section}.${number}  ${start}    ${end}    ${title} ${duration}m`)
  }
  lines.push('-'.repeat(95))
  const hours = Math.floor(totalMinutes / 60)
  const minutes = Math.trunc(totalMinutes % 60)
  lines.push(`Total: ${lectures.length} lectures, ${hours}h ${minutes}m total duration`)
  return lines.join('\n')
}
