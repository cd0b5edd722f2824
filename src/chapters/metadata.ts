import type { TimestampEntry } from '../discovery/types.js'

export const FFMETADATA_HEADER = ';FFMETADATA1'

export type Chapter = {
  startMillis: number
  endMillis: number
  title: string
}

/** Chapters for found entries only, in schedule order. */
export function buildChapters(entries: readonly TimestampEntry[]): Chapter[] {
  return entries
    .filter((entry) => entry.found)
    .map((entry) => ({
      startMillis: Math.trunc(entry.startSeconds * 1000),
      endMillis: Math.trunc(entry.endSeconds * 1000),
      title: entry.lecture.title,
    }))
}

export function escapeMetadataValue(value: string): string {
  return value.replace(/\r\n|\r|\n/g, ' ').replace(/[=;#\\]/g, (char) => `\\${char}`)
}

/**
 * ffmetadata text: the container's existing metadata followed by one
 * [CHAPTER] block per chapter. The last chapter runs to the container end
 * when its duration is known.
 */
export function renderChapterMetadata({
  existing,
  chapters,
  durationSeconds,
}: {
  existing: string
  chapters: readonly Chapter[]
  durationSeconds: number | null
}): string {
  const base = existing.trimEnd()
  const header = base.startsWith(FFMETADATA_HEADER) ? base : `${FFMETADATA_HEADER}\n${base}`.trimEnd()
  const blocks = chapters.map((chapter, index) => {
    const isLast = index === chapters.length - 1
    const containerEnd =
      isLast && durationSeconds !== null ? Math.trunc(durationSeconds * 1000) : null
    const end =
      containerEnd !== null && containerEnd > chapter.startMillis ? containerEnd : chapter.endMillis
    return [
      '[CHAPTER]',
      'TIMEBASE=1/1000',
      `START=${chapter.startMillis}`,
      `END=${end}`,
      `title=${escapeMetadataValue(chapter.title)}`,
    ].join('\n')
  })
  return [header, ...blocks].join('\n\n') + '\n'
}
