import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import type { Logger } from 'tslog'

import { formatErrorMessage } from '../errors.js'
import { probeVideoDuration } from '../video/probe.js'
import { runProcessCapture } from '../video/process.js'
import type { Chapter } from './metadata.js'
import { renderChapterMetadata } from './metadata.js'

const METADATA_TIMEOUT_MS = 60_000
const REMUX_TIMEOUT_MS = 60 * 60_000

export function resolveChaptersOutputPath(videoPath: string, explicit?: string | null): string {
  if (explicit) return path.resolve(explicit)
  const parsed = path.parse(path.resolve(videoPath))
  return path.join(parsed.dir, `${parsed.name}_chapters.mp4`)
}

export function buildRemuxArgs({
  videoPath,
  metadataPath,
  outputPath,
}: {
  videoPath: string
  metadataPath: string
  outputPath: string
}): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-i',
    videoPath,
    '-i',
    metadataPath,
    '-map',
    '0',
    '-map_metadata',
    '1',
    '-map_chapters',
    '1',
    '-codec',
    'copy',
    outputPath,
  ]
}

/** Existing container metadata as ffmetadata text; empty when extraction fails. */
export async function extractContainerMetadata({
  ffmpegPath,
  videoPath,
  logger,
  signal,
}: {
  ffmpegPath: string
  videoPath: string
  logger: Logger<Record<string, unknown>>
  signal?: AbortSignal
}): Promise<string> {
  try {
    return await runProcessCapture({
      command: ffmpegPath,
      args: ['-hide_banner', '-loglevel', 'error', '-i', videoPath, '-f', 'ffmetadata', '-'],
      timeoutMs: METADATA_TIMEOUT_MS,
      errorLabel: 'ffmpeg metadata',
      signal,
    })
  } catch (error) {
    if (signal?.aborted) throw error
    logger.warn(`Error extracting metadata: ${formatErrorMessage(error)}`)
    return ''
  }
}

/**
 * Writes chapters into a copy of the video without re-encoding. The copy is
 * muxed to a `.partial` file and renamed into place only after ffmpeg
 * succeeds.
 */
export async function writeVideoChapters({
  ffmpegPath,
  ffprobePath,
  videoPath,
  chapters,
  outputPath,
  logger,
  signal,
}: {
  ffmpegPath: string
  ffprobePath: string | null
  videoPath: string
  chapters: readonly Chapter[]
  outputPath?: string | null
  logger: Logger<Record<string, unknown>>
  signal?: AbortSignal
}): Promise<string | null> {
  if (chapters.length === 0) {
    logger.warn('No chapters with valid timings found')
    return null
  }

  const target = resolveChaptersOutputPath(videoPath, outputPath)
  const partial = `${target}.partial${path.extname(target)}`
  const workDir = await fs.mkdtemp(path.join(tmpdir(), 'lecture-chapters-'))
  const metadataPath = path.join(workDir, 'FFMETADATAFILE.txt')

  try {
    const existing = await extractContainerMetadata({ ffmpegPath, videoPath, logger, signal })
    const durationSeconds = await probeVideoDuration({ ffprobePath, videoPath, logger })
    const metadata = renderChapterMetadata({ existing, chapters, durationSeconds })
    await fs.writeFile(metadataPath, metadata, 'utf8')
    logger.info(`Chapters metadata written to ${metadataPath}`)

    const args = buildRemuxArgs({ videoPath, metadataPath, outputPath: partial })
    logger.debug(`ffmpeg ${args.join(' ')}`)
    await runProcessCapture({
      command: ffmpegPath,
      args,
      timeoutMs: REMUX_TIMEOUT_MS,
      errorLabel: 'ffmpeg remux',
      signal,
    })
    await fs.rename(partial, target)
    logger.info(`Chapters added to: ${target}`)
    return target
  } catch (error) {
    await fs.rm(partial, { force: true })
    throw error
  } finally {
    await fs.rm(workDir, { recursive: true, force: true })
  }
}
