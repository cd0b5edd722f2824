import type { Logger } from 'tslog'

import { formatErrorMessage } from '../errors.js'
import { runProcessCapture } from './process.js'
import type { FrameSize } from './types.js'

const FFPROBE_TIMEOUT_MS = 30_000

function parseJsonObject(output: string): object | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(output)
  } catch {
    return null
  }
  return typeof parsed === 'object' && parsed !== null ? parsed : null
}

export function parseProbeDuration(output: string): number | null {
  const parsed = parseJsonObject(output)
  if (!parsed) return null
  const format = 'format' in parsed ? parsed.format : null
  if (typeof format !== 'object' || format === null || !('duration' in format)) return null
  const duration = Number(format.duration)
  return Number.isFinite(duration) && duration > 0 ? duration : null
}

/** Container duration in seconds, or null when ffprobe is unavailable or fails. */
export async function probeVideoDuration({
  ffprobePath,
  videoPath,
  logger,
}: {
  ffprobePath: string | null
  videoPath: string
  logger: Logger<Record<string, unknown>>
}): Promise<number | null> {
  if (!ffprobePath) {
    logger.warn('ffprobe not found; last chapter keeps its estimated end')
    return null
  }
  const args = ['-v', 'error', '-print_format', 'json', '-show_format', videoPath]
  try {
    const output = await runProcessCapture({
      command: ffprobePath,
      args,
      timeoutMs: FFPROBE_TIMEOUT_MS,
      errorLabel: 'ffprobe',
    })
    const duration = parseProbeDuration(output)
    if (duration === null) logger.warn(`ffprobe reported no duration for ${videoPath}`)
    return duration
  } catch (error) {
    logger.warn(`Unable to probe video duration: ${formatErrorMessage(error)}`)
    return null
  }
}

/** Width and height of the first video stream, from `-show_entries stream=width,height`. */
export function parseProbeDimensions(output: string): FrameSize | null {
  const parsed = parseJsonObject(output)
  if (!parsed || !('streams' in parsed) || !Array.isArray(parsed.streams)) return null
  const stream: unknown = parsed.streams[0]
  if (typeof stream !== 'object' || stream === null) return null
  const width = 'width' in stream ? Number(stream.width) : Number.NaN
  const height = 'height' in stream ? Number(stream.height) : Number.NaN
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return null
  }
  return { width, height }
}

/** Decoded frame size, or null when ffprobe is unavailable or fails. */
export async function probeVideoDimensions({
  ffprobePath,
  videoPath,
  logger,
}: {
  ffprobePath: string | null
  videoPath: string
  logger: Logger<Record<string, unknown>>
}): Promise<FrameSize | null> {
  if (!ffprobePath) return null
  const args = [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=width,height',
    '-print_format',
    'json',
    videoPath,
  ]
  try {
    const output = await runProcessCapture({
      command: ffprobePath,
      args,
      timeoutMs: FFPROBE_TIMEOUT_MS,
      errorLabel: 'ffprobe',
    })
    const size = parseProbeDimensions(output)
    if (!size) logger.warn(`ffprobe reported no frame size for ${videoPath}`)
    return size
  } catch (error) {
    logger.warn(`Unable to probe frame size: ${formatErrorMessage(error)}`)
    return null
  }
}
