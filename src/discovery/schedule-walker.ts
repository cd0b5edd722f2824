import type { Logger } from 'tslog'

import { ConfigurationError, SearchAbortedError, formatErrorMessage } from '../errors.js'
import { formatCropRegion, resolveCropBox, validateCropRegion } from '../ocr/crop.js'
import type { CropRegion } from '../ocr/types.js'
import type { Lecture } from '../schedule/types.js'
import { formatHms } from '../time.js'
import type { FrameSize } from '../video/types.js'
import { deriveSearchText } from './search-text.js'
import type { BoundarySearch, BoundarySearchResult, DiscoveryHooks, TimestampEntry } from './types.js'

/** Extra seconds of window after a document entry, which has no on-screen start marker. */
export const DOCUMENT_WINDOW_BONUS_SECONDS = 60

export type DiscoverTimestampsOptions = {
  videoPath: string
  lectures: readonly Lecture[]
  windowSeconds: number
  crop?: CropRegion | null
  /** Decoded frame size; when known, a crop that resolves to no pixels is rejected up front. */
  frameSize?: FrameSize | null
  truncateLength?: number | null
  stripPrefix?: boolean
  search: BoundarySearch
  logger: Logger<Record<string, unknown>>
  hooks?: DiscoveryHooks | null
  signal?: AbortSignal
}

export function resolveLectureWindow(
  baseWindowSeconds: number,
  previous: Pick<Lecture, 'kind'> | undefined
): number {
  return previous?.kind === 'document'
    ? baseWindowSeconds + DOCUMENT_WINDOW_BONUS_SECONDS
    : baseWindowSeconds
}

function validateOptions({
  windowSeconds,
  crop,
  frameSize,
  truncateLength,
}: DiscoverTimestampsOptions) {
  if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
    throw new ConfigurationError(`Search window must be a positive number of seconds`)
  }
  if (truncateLength != null && (!Number.isInteger(truncateLength) || truncateLength < 1)) {
    throw new ConfigurationError(`Truncate length must be a positive integer`)
  }
  if (crop) {
    validateCropRegion(crop)
    if (frameSize) resolveCropBox(crop, frameSize.width, frameSize.height)
  }
}

/**
 * Walks the schedule in order, searching each lecture around the end of the
 * previous one.
 *
 * A found start closes the immediately preceding entry at that start; only
 * that one entry is revised, even after a run of misses. A missed lecture
 * starts at the running cursor and keeps its duration-based end.
 */
export async function discoverTimestamps(
  options: DiscoverTimestampsOptions
): Promise<TimestampEntry[]> {
  validateOptions(options)
  const { videoPath, lectures, crop, search, logger, hooks, signal } = options
  logger.info(
    crop
      ? `Crop area: ${formatCropRegion(crop)}`
      : 'No crop area specified, analysing the whole frame'
  )

  const entries: TimestampEntry[] = []
  let lastEndSeconds = 0

  for (const [index, source] of lectures.entries()) {
    if (signal?.aborted) throw new SearchAbortedError()
    const lecture: Lecture = { ...source }
    logger.info(`Searching lecture ${index + 1}/${lectures.length}: ${lecture.title}`)

    const searchText = deriveSearchText(lecture, {
      stripPrefix: options.stripPrefix,
      truncateLength: options.truncateLength,
    })
    if (searchText !== lecture.title) {
      logger.info(`Search text for "${lecture.title}": "${searchText}"`)
    }

    const windowSeconds = resolveLectureWindow(options.windowSeconds, lectures[index - 1])
    if (windowSeconds !== options.windowSeconds) {
      logger.info(`Window extended to ${windowSeconds}s after a document entry`)
    }
    const centerSeconds = lastEndSeconds
    hooks?.onLectureStart?.({
      index,
      total: lectures.length,
      lecture,
      searchText,
      centerSeconds,
      windowSeconds,
    })

    const result = await runSearch({
      search,
      logger,
      request: { videoPath, centerSeconds, windowSeconds, targetText: searchText, crop, signal },
    })
    const found = result?.state === 'found'
    const startSeconds = result?.state === 'found' ? result.timestamp : lastEndSeconds
    if (found) {
      logger.info(`Lecture found: ${lecture.title} at ${formatHms(startSeconds)}`)
    } else {
      logger.warn(`Start not found for: ${lecture.title}. Using estimated time.`)
    }

    const predecessor = entries[index - 1]
    if (predecessor) {
      predecessor.endSeconds = startSeconds
      logger.info(`Updated end of lecture ${index}: ${formatHms(startSeconds)}`)
      hooks?.onEntryCorrected?.({ index: index - 1, entry: predecessor })
    }

    const entry: TimestampEntry = {
      lecture,
      searchText,
      searchCenterSeconds: centerSeconds,
      windowSeconds,
      startSeconds,
      endSeconds: startSeconds + lecture.estimatedDurationMinutes * 60,
      found,
    }
    entries.push(entry)
    lastEndSeconds = entry.endSeconds
    logger.info(`Next search will start from: ${formatHms(lastEndSeconds)}`)
    hooks?.onLectureDone?.({ index, total: lectures.length, entry })
  }

  return entries
}

async function runSearch({
  search,
  logger,
  request,
}: {
  search: BoundarySearch
  logger: Logger<Record<string, unknown>>
  request: Parameters<BoundarySearch>[0]
}): Promise<BoundarySearchResult | null> {
  if (!request.targetText) {
    logger.warn('Search text is empty; skipping search')
    return null
  }
  try {
    return await search(request)
  } catch (error) {
    if (error instanceof SearchAbortedError || error instanceof ConfigurationError) throw error
    logger.error(`Search failed for "${request.targetText}": ${formatErrorMessage(error)}`)
    return null
  }
}
