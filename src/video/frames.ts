import { spawn } from 'node:child_process'

import type { Logger } from 'tslog'

import { formatErrorMessage } from '../errors.js'
import { appendStderr, isRunning, waitForExit } from './process.js'
import { PngStreamParser } from './png-stream.js'
import type { FrameSource, FrameStreamRequest, VideoFrame } from './types.js'

export function buildFrameExtractionArgs({
  videoPath,
  window,
  fps,
}: Omit<FrameStreamRequest, 'signal'>): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-ss',
    String(window.startSeconds),
    '-t',
    String(window.durationSeconds),
    '-i',
    videoPath,
    '-vf',
    `fps=${fps}`,
    '-f',
    'image2pipe',
    '-vcodec',
    'png',
    '-',
  ]
}

/**
 * Streams PNG frames for one window straight from ffmpeg's stdout.
 *
 * A decoder that fails to start or exits non-zero ends the stream early; the
 * caller sees fewer frames, never an error. Stopping iteration (or aborting
 * `signal`) terminates ffmpeg and waits for it to exit.
 */
export async function* extractFrames(
  { videoPath, window, fps, signal }: FrameStreamRequest,
  {
    ffmpegPath,
    logger,
  }: {
    ffmpegPath: string
    logger: Logger<Record<string, unknown>>
  }
): AsyncGenerator<VideoFrame, void, undefined> {
  if (signal?.aborted) return
  const args = buildFrameExtractionArgs({ videoPath, window, fps })
  logger.debug(`ffmpeg ${args.join(' ')}`)

  const proc = spawn(ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] })
  const exited = waitForExit(proc)
  const failure: { error: Error | null } = { error: null }
  proc.once('error', (error) => {
    failure.error = error
  })
  let stderr = ''
  proc.stderr?.setEncoding('utf8')
  proc.stderr?.on('data', (chunk: string) => {
    stderr = appendStderr(stderr, chunk)
  })

  const stop = () => {
    if (isRunning(proc)) proc.kill('SIGTERM')
  }
  signal?.addEventListener('abort', stop, { once: true })

  const parser = new PngStreamParser()
  let index = 0
  let completed = false
  try {
    if (proc.stdout) {
      for await (const chunk of proc.stdout) {
        if (!(chunk instanceof Uint8Array)) continue
        for (const png of parser.push(chunk)) {
          yield { index, timestamp: window.startSeconds + index / fps, png }
          index += 1
        }
      }
    }
    completed = true
  } catch (error) {
    if (!signal?.aborted) logger.error(`Frame stream failed: ${formatErrorMessage(error)}`)
  } finally {
    signal?.removeEventListener('abort', stop)
    stop()
    const code = await exited
    if (completed && !signal?.aborted) {
      const leftover = parser.finish()
      if (leftover > 0) logger.warn(`Discarded ${leftover} bytes of an incomplete frame`)
      if (parser.discardedBytes > leftover) {
        logger.warn(`Skipped ${parser.discardedBytes - leftover} malformed bytes in frame stream`)
      }
      if (failure.error) {
        logger.error(`ffmpeg failed to start: ${formatErrorMessage(failure.error)}`)
      } else if (code !== 0) {
        const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
        logger.warn(`ffmpeg exited with code ${code}${suffix}`)
      }
    }
    logger.debug(`Frame stream closed after ${index} frames`)
  }
}

export function createFfmpegFrameSource({
  ffmpegPath,
  logger,
}: {
  ffmpegPath: string
  logger: Logger<Record<string, unknown>>
}): FrameSource {
  return (request) => extractFrames(request, { ffmpegPath, logger })
}
