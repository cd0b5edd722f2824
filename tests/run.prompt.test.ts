import { describe, expect, it, vi } from 'vitest'

import type { TimestampEntry } from '../src/discovery/types.js'
import { confirmChapterCreation, promptManualTimestamps } from '../src/run/prompt.js'
import { formatRunSummary } from '../src/run/summary.js'

const entry = (
  sequenceNumber: number,
  title: string,
  startSeconds: number,
  found: boolean
): TimestampEntry => ({
  lecture: {
    kind: 'video',
    title,
    estimatedDurationMinutes: 10,
    sequenceNumber,
    sectionNumber: 1,
    estimatedStartMinutes: 0,
    estimatedEndMinutes: 10,
  },
  searchText: title,
  searchCenterSeconds: startSeconds,
  windowSeconds: 90,
  startSeconds,
  endSeconds: startSeconds + 600,
  found,
})

function scriptedAsk(answers: string[]) {
  const queue = [...answers]
  return vi.fn(async (_question: string) => queue.shift() ?? '')
}

describe('manual timestamps', () => {
  it('asks for each missing lecture and retries invalid input', async () => {
    const entries = [entry(1, 'Welcome', 0, true), entry(2, 'Setup', 610, false), entry(3, 'Tools', 1205, false)]
    const ask = scriptedAsk(['soon', '00:10:20', ''])
    const written: string[] = []

    const result = await promptManualTimestamps(entries, { ask, write: (text) => written.push(text) })

    expect(ask).toHaveBeenCalledTimes(3)
    expect(ask).toHaveBeenCalledWith('Enter the start time (HH:MM:SS) or press Enter to skip: ')
    expect(written).toEqual([
      '\nLectures not found:\n',
      '2. Setup\n',
      '   Search started from: 00:10:10.00\n',
      'Invalid format. Use HH:MM:SS\n',
      'Start set to 00:10:20.00\n',
      '3. Tools\n',
      '   Search started from: 00:20:05.00\n',
    ])
    expect(result[1]).toMatchObject({ startSeconds: 620, endSeconds: 1220, found: true })
    expect(result[2]).toBe(entries[2])
    expect(result[0]).toBe(entries[0])
    expect(entries[1]?.found).toBe(false)
  })

  it('does not ask when everything was found', async () => {
    const ask = scriptedAsk([])
    const write = vi.fn()

    const result = await promptManualTimestamps([entry(1, 'Welcome', 0, true)], { ask, write })

    expect(result).toHaveLength(1)
    expect(ask).not.toHaveBeenCalled()
    expect(write).not.toHaveBeenCalled()
  })

  it('accepts y or yes as confirmation', async () => {
    await expect(confirmChapterCreation(scriptedAsk([' Y ']))).resolves.toBe(true)
    await expect(confirmChapterCreation(scriptedAsk(['yes']))).resolves.toBe(true)
    await expect(confirmChapterCreation(scriptedAsk(['n']))).resolves.toBe(false)
    await expect(confirmChapterCreation(scriptedAsk(['yep']))).resolves.toBe(false)
  })
})

describe('run summary', () => {
  it('lists found and missing lecture numbers', () => {
    expect(
      formatRunSummary([entry(1, 'A', 0, true), entry(2, 'B', 600, false), entry(3, 'C', 1200, true)])
    ).toBe(
      [
        '=== Search summary ===',
        'Lectures processed: 3',
        'Found: 2',
        '  Lecture numbers: 1, 3',
        'Not found: 1',
        '  Lecture numbers: 2',
        '==============================',
      ].join('\n')
    )
  })

  it('omits empty number lists', () => {
    expect(formatRunSummary([entry(4, 'A', 0, true)])).toBe(
      [
        '=== Search summary ===',
        'Lectures processed: 1',
        'Found: 1',
        '  Lecture numbers: 4',
        'Not found: 0',
        '==============================',
      ].join('\n')
    )
  })
})
