import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import type { TimestampEntry } from '../src/discovery/types.js'
import { renderTimestampsCsv, writeTimestampsCsv } from '../src/export/csv.js'

const entry = (
  sequenceNumber: number,
  title: string,
  startSeconds: number,
  endSeconds: number,
  found: boolean
): TimestampEntry => ({
  lecture: {
    kind: 'video',
    title,
    estimatedDurationMinutes: 10,
    sequenceNumber,
    sectionNumber: 2,
    estimatedStartMinutes: 0,
    estimatedEndMinutes: 10,
  },
  searchText: title,
  searchCenterSeconds: startSeconds,
  windowSeconds: 90,
  startSeconds,
  endSeconds,
  found,
})

describe('timestamps csv', () => {
  it('renders a header and one CRLF-terminated row per entry', () => {
    const csv = renderTimestampsCsv([
      entry(4, 'Welcome', 0, 610, true),
      entry(5, 'Setup', 610, 1205.5, false),
    ])

    expect(csv).toBe(
      'Section,Lecture,Title,Start,End,Duration,Found\r\n' +
        '2,4,Welcome,00:00:00.00,00:10:10.00,00:10:10.00,Yes\r\n' +
        '2,5,Setup,00:10:10.00,00:20:05.50,00:09:55.50,No\r\n'
    )
  })

  it('quotes titles with commas and quotes', () => {
    const csv = renderTimestampsCsv([entry(1, 'Intro, "basics"', 0, 60, true)])

    expect(csv.split('\r\n')[1]).toBe(
      '2,1,"Intro, ""basics""",00:00:00.00,00:01:00.00,00:01:00.00,Yes'
    )
  })

  it('creates the parent directory and returns the absolute path', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'lecture-chapters-csv-'))
    const target = join(dir, 'nested', 'timestamps.csv')

    const written = await writeTimestampsCsv([entry(1, 'Welcome', 0, 60, true)], target)

    expect(written).toBe(target)
    expect(readFileSync(target, 'utf8')).toBe(
      'Section,Lecture,Title,Start,End,Duration,Found\r\n' +
        '2,1,Welcome,00:00:00.00,00:01:00.00,00:01:00.00,Yes\r\n'
    )
  })
})
