import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { TimestampEntry } from '../discovery/types.js'
import { formatHms } from '../time.js'

export const CSV_HEADER = ['Section', 'Lecture', 'Title', 'Start', 'End', 'Duration', 'Found']

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export function formatTimestampRows(entries: readonly TimestampEntry[]): string[][] {
  return entries.map((entry) => [
    String(entry.lecture.sectionNumber),
    String(entry.lecture.sequenceNumber),
    entry.lecture.title,
    formatHms(entry.startSeconds),
    formatHms(entry.endSeconds),
    formatHms(entry.endSeconds - entry.startSeconds),
    entry.found ? 'Yes' : 'No',
  ])
}

export function renderTimestampsCsv(entries: readonly TimestampEntry[]): string {
  const lines = [CSV_HEADER, ...formatTimestampRows(entries)].map((row) =>
    row.map(escapeCsvField).join(',')
  )
  return `${lines.join('\r\n')}\r\n`
}

export async function writeTimestampsCsv(
  entries: readonly TimestampEntry[],
  outputPath: string
): Promise<string> {
  const resolved = path.resolve(outputPath)
  await fs.mkdir(path.dirname(resolved), { recursive: true })
  await fs.writeFile(resolved, renderTimestampsCsv(entries), 'utf8')
  return resolved
}
