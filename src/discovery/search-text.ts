import type { Lecture } from '../schedule/types.js'

export type SearchTextOptions = {
  stripPrefix?: boolean
  truncateLength?: number | null
}

/** Drops everything up to and including the first whitespace run ("150. Intro" -> "Intro"). */
export function stripTitlePrefix(title: string): string {
  const match = /\s+/.exec(title)
  if (!match) return title
  return title.slice(match.index + match[0].length)
}

/**
 * OCR target for a lecture. Document entries always lose their numeric
 * prefix; truncation keeps the first `truncateLength` characters before the
 * final trim.
 */
export function deriveSearchText(
  lecture: Pick<Lecture, 'title' | 'kind'>,
  { stripPrefix = false, truncateLength = null }: SearchTextOptions = {}
): string {
  let text = lecture.title
  if (stripPrefix || lecture.kind === 'document') {
    text = stripTitlePrefix(text)
  }
  if (truncateLength != null && text.length > truncateLength) {
    text = text.slice(0, truncateLength)
  }
  return text.trim()
}
