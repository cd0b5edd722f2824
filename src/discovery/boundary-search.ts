import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { Logger } from 'tslog'

import { ConfigurationError, SearchAbortedError, formatErrorMessage } from '../errors.js'
import { formatCropRegion } from '../ocr/crop.js'
import type { ImageNormalizer, NormalizedImage, TextMatcher } from '../ocr/types.js'
import { formatHms } from '../time.js'
import type { FrameSource, VideoFrame } from '../video/types.js'
import type {
  BoundarySearch,
  BoundarySearchExhausted,
  BoundarySearchFound,
  BoundarySearchRequest,
  BoundarySearchResult,
  BoundarySearchState,
} from './types.js'
import { buildSearchWindow } from './window.js'

export const DEFAULT_FPS = 1
export const DEFAULT_OCR_WORKERS = 4
const MAX_OCR_WORKERS = 16
const PROGRESS_EVERY_FRAMES = 10

export type BoundarySearchDeps = {
  frames: FrameSource
  normalize: ImageNormalizer
  matcher: TextMatcher
  logger: Logger<Record<string, unknown>>
  fps?: number
  /** Frames evaluated concurrently; results are still consumed in time order. */
  workers?: number
  saveFramesDir?: string | null
  onProgress?: ((text: string) => void) | null
  now?: () => number
}

type FrameOutcome = {
  matched: boolean
  normalized: NormalizedImage | null
  /** Set when the frame shows the settings cannot work for any frame (an empty crop). */
  fatal?: ConfigurationError
}
type PendingFrame = { frame: VideoFrame; outcome: Promise<FrameOutcome> }

export function clampWorkers(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_OCR_WORKERS
  return Math.max(1, Math.min(MAX_OCR_WORKERS, Math.round(value)))
}

export function buildFrameFileNames(videoPath: string, timestamp: number) {
  const base = path.basename(videoPath, path.extname(videoPath))
  const label = formatHms(timestamp).replace(/:/g, '_')
  return {
    original: `${base}_frame_${label}.png`,
    processed: `${base}_frame_${label}_processed.png`,
  }
}

/**
 * Scans one window for the first frame whose OCR text contains the target.
 *
 * SCANNING -> FOUND on the first match in time order (later frames already in
 * flight are cancelled and the decoder is stopped), SCANNING -> EXHAUSTED when
 * the frames run out. Aborting `request.signal` rejects with SearchAbortedError;
 * a ConfigurationError from normalization stops the search and is rethrown.
 * In-flight OCR is awaited before the search settles.
 */
export async function searchBoundary(
  request: BoundarySearchRequest,
  deps: BoundarySearchDeps
): Promise<BoundarySearchResult> {
  const { logger } = deps
  const now = deps.now ?? Date.now
  const fps = deps.fps ?? DEFAULT_FPS
  const workers = clampWorkers(deps.workers ?? DEFAULT_OCR_WORKERS)
  const { signal } = request
  if (signal?.aborted) throw new SearchAbortedError()

  const window = buildSearchWindow(request.centerSeconds, request.windowSeconds)
  const target = request.targetText
  const startedAt = now()
  let state: BoundarySearchState = 'scanning'
  const transition = (next: BoundarySearchState) => {
    logger.debug(`Boundary search ${state} -> ${next}`)
    state = next
  }

  const cropInfo = request.crop ? ` (area ${formatCropRegion(request.crop)})` : ''
  logger.info(
    `Searching "${target}" in ${request.videoPath}: center=${window.centerSeconds} window=${window.requestedSeconds}s fps=${fps}${cropInfo}`
  )
  if (window.durationSeconds > window.requestedSeconds) {
    logger.info(
      `Window clamped at 0s; end extended by ${(window.durationSeconds - window.requestedSeconds).toFixed(2)}s`
    )
  }
  deps.onProgress?.(
    `Searching for '${target}' from ${formatHms(window.startSeconds)} to ${formatHms(window.endSeconds)} at ${fps} fps${cropInfo}...`
  )

  const inflight = new AbortController()
  const cancel = () => inflight.abort()
  signal?.addEventListener('abort', cancel, { once: true })

  const evaluate = async (frame: VideoFrame): Promise<FrameOutcome> => {
    try {
      const normalized = await deps.normalize(frame.png, request.crop)
      const matched = await deps.matcher(normalized, target, inflight.signal)
      return { matched, normalized }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { matched: false, normalized: null, fatal: error }
      }
      logger.error(`Error processing frame ${frame.index}: ${formatErrorMessage(error)}`)
      return { matched: false, normalized: null }
    }
  }

  const pending: PendingFrame[] = []
  let framesScanned = 0

  const settleHead = async (): Promise<BoundarySearchFound | null> => {
    const head = pending.shift()
    if (!head) return null
    const outcome = await head.outcome
    if (outcome.fatal) throw outcome.fatal
    framesScanned += 1
    if (head.frame.index % PROGRESS_EVERY_FRAMES === 0) {
      logger.info(`Processed frame ${head.frame.index} at ${formatHms(head.frame.timestamp)}`)
    }
    if (!outcome.matched) return null
    transition('found')
    return await buildFound(head.frame, outcome.normalized)
  }

  const buildFound = async (
    frame: VideoFrame,
    normalized: NormalizedImage | null
  ): Promise<BoundarySearchFound> => {
    const elapsedMs = now() - startedAt
    logger.info(`Text found in frame ${frame.index} at ${formatHms(frame.timestamp)}`)
    logger.info(`Total processing time: ${formatHms(elapsedMs / 1000)}`)
    const savedFrames = await saveMatchedFrames(frame, normalized)
    deps.onProgress?.(
      `Text found at ${formatHms(frame.timestamp)} (frame ${frame.index}), elapsed ${formatHms(elapsedMs / 1000)}`
    )
    return {
      state: 'found',
      timestamp: frame.timestamp,
      frameIndex: frame.index,
      framesScanned,
      elapsedMs,
      window,
      savedFrames,
    }
  }

  const saveMatchedFrames = async (
    frame: VideoFrame,
    normalized: NormalizedImage | null
  ): Promise<string[]> => {
    const dir = deps.saveFramesDir
    if (!dir) return []
    const names = buildFrameFileNames(request.videoPath, frame.timestamp)
    const saved: string[] = []
    try {
      await fs.mkdir(dir, { recursive: true })
      const originalPath = path.join(dir, names.original)
      await fs.writeFile(originalPath, frame.png)
      saved.push(originalPath)
      if (normalized) {
        const processedPath = path.join(dir, names.processed)
        await fs.writeFile(processedPath, normalized.png)
        saved.push(processedPath)
      }
      for (const file of saved) logger.info(`Saved frame as: ${file}`)
    } catch (error) {
      logger.error(`Unable to save matched frame: ${formatErrorMessage(error)}`)
    }
    return saved
  }

  const exhausted = (): BoundarySearchExhausted => {
    transition('exhausted')
    const elapsedMs = now() - startedAt
    logger.info(`Search completed. Text not found. Total time: ${formatHms(elapsedMs / 1000)}`)
    deps.onProgress?.(`Text not found. Elapsed time: ${formatHms(elapsedMs / 1000)}`)
    return { state: 'exhausted', framesScanned, elapsedMs, window }
  }

  try {
    const frames = deps.frames({
      videoPath: request.videoPath,
      window,
      fps,
      signal: inflight.signal,
    })
    for await (const frame of frames) {
      if (signal?.aborted) break
      pending.push({ frame, outcome: evaluate(frame) })
      while (pending.length >= workers && !signal?.aborted) {
        const found = await settleHead()
        if (found) return found
      }
    }
    while (pending.length > 0 && !signal?.aborted) {
      const found = await settleHead()
      if (found) return found
    }
    if (signal?.aborted) {
      logger.warn('Search interrupted by user')
      throw new SearchAbortedError()
    }
    return exhausted()
  } finally {
    signal?.removeEventListener('abort', cancel)
    inflight.abort()
    await Promise.allSettled(pending.map((entry) => entry.outcome))
  }
}

export function createBoundarySearch(deps: BoundarySearchDeps): BoundarySearch {
  return (request) => searchBoundary(request, deps)
}
