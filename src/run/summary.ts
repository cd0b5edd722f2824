import type { TimestampEntry } from '../discovery/types.js'

const RULE = '='.repeat(30)

export function formatRunSummary(entries: readonly TimestampEntry[]): string {
  const found = entries.filter((entry) => entry.found)
  const missing = entries.filter((entry) => !entry.found)
  const numbers = (list: TimestampEntry[]) =>
    list.map((entry) => entry.lecture.sequenceNumber).join(', ')

  const lines = ['=== Search summary ===', `Lectures processed: ${entries.length}`]
  lines.push(`Found: ${found.length}`)
  if (found.length > 0) lines.push(`  Lecture numbers: ${numbers(found)}`)
  lines.push(`Not found: ${missing.length}`)
  if (missing.length > 0) lines.push(`  Lecture numbers: ${numbers(missing)}`)
  lines.push(RULE)
  return lines.join('\n')
}
