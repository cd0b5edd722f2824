import type { Interface } from 'node:readline/promises'
import { createInterface } from 'node:readline/promises'

import type { TimestampEntry } from '../discovery/types.js'
import { SearchAbortedError } from '../errors.js'
import { parseManualTimestamp } from '../flags.js'
import { formatHms } from '../time.js'

/** Asks one question and resolves with the raw answer line. */
export type Ask = (question: string) => Promise<string>

export type PromptIo = {
  ask: Ask
  write: (text: string) => void
}

/** The readline interface is opened on the first question so runs without prompts never touch stdin. */
export function createReadlineAsk({
  input,
  output,
  signal,
  onInterrupt,
}: {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  signal?: AbortSignal
  onInterrupt?: (() => void) | null
}): { ask: Ask; close: () => void } {
  let rl: Interface | null = null
  const open = (): Interface => {
    if (rl) return rl
    const created = createInterface({ input, output })
    created.on('SIGINT', () => {
      onInterrupt?.()
    })
    rl = created
    return created
  }
  const ask: Ask = async (question) => {
    if (signal?.aborted) throw new SearchAbortedError('Interrupted by user')
    try {
      return await open().question(question, { signal })
    } catch (error) {
      if (signal?.aborted) throw new SearchAbortedError('Interrupted by user')
      throw error
    }
  }
  return {
    ask,
    close: () => {
      rl?.close()
      rl = null
    },
  }
}

/** The entry with a user-supplied start; its end follows from the estimated duration. */
export function applyManualTimestamp(entry: TimestampEntry, startSeconds: number): TimestampEntry {
  return {
    ...entry,
    startSeconds,
    endSeconds: startSeconds + entry.lecture.estimatedDurationMinutes * 60,
    found: true,
  }
}

/**
 * Offers a manual `HH:MM:SS` start for every lecture that was not found.
 * A blank answer skips the lecture; neighbouring entries are left alone.
 */
export async function promptManualTimestamps(
  entries: readonly TimestampEntry[],
  { ask, write }: PromptIo
): Promise<TimestampEntry[]> {
  const result = [...entries]
  const missing = result.filter((entry) => !entry.found)
  if (missing.length === 0) return result

  write('\nLectures not found:\n')
  for (const [index, entry] of result.entries()) {
    if (entry.found) continue
    write(`${index + 1}. ${entry.lecture.title}\n`)
    write(`   Search started from: ${formatHms(entry.startSeconds)}\n`)
    for (;;) {
      const answer = (await ask('Enter the start time (HH:MM:SS) or press Enter to skip: ')).trim()
      if (!answer) break
      const seconds = parseManualTimestamp(answer)
      if (seconds === null) {
        write('Invalid format. Use HH:MM:SS\n')
        continue
      }
      result[index] = applyManualTimestamp(entry, seconds)
      write(`Start set to ${formatHms(seconds)}\n`)
      break
    }
  }
  return result
}

export async function confirmChapterCreation(ask: Ask): Promise<boolean> {
  const answer = (await ask('\nProceed with chapter creation? (y/n): ')).trim().toLowerCase()
  return answer === 'y' || answer === 'yes'
}
