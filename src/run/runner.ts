import { access } from 'node:fs/promises'

import { CommanderError } from 'commander'

import { writeVideoChapters } from '../chapters/ffmpeg.js'
import { buildChapters } from '../chapters/metadata.js'
import type { LectureChaptersConfig } from '../config.js'
import { loadLectureChaptersConfig } from '../config.js'
import { createBoundarySearch } from '../discovery/boundary-search.js'
import { discoverTimestamps } from '../discovery/schedule-walker.js'
import type { BoundarySearch, DiscoveryHooks } from '../discovery/types.js'
import { ConfigurationError, SearchAbortedError, formatErrorMessage } from '../errors.js'
import { writeTimestampsCsv } from '../export/csv.js'
import type { RunLogger } from '../logging/run-logger.js'
import { createRunLogger, resolveRunLoggingConfig } from '../logging/run-logger.js'
import { createTextMatcher } from '../ocr/matcher.js'
import { normalizeFrame } from '../ocr/normalize.js'
import { createTesseractRecognizer } from '../ocr/tesseract.js'
import { calculateEstimatedTimes, parseScheduleRows, selectLectures } from '../schedule/parser.js'
import type { ScheduleRow } from '../schedule/types.js'
import { loadScheduleRows } from '../schedule/workbook.js'
import { formatHms } from '../time.js'
import { formatVersionLine } from '../version.js'
import { createFfmpegFrameSource } from '../video/frames.js'
import { probeVideoDimensions } from '../video/probe.js'
import { resolveToolPath } from '../video/process.js'
import { handleHelpRequest, handleScheduleRequest } from './cli-preflight.js'
import { attachHelpFooter, buildProgram } from './help.js'
import type { Ask } from './prompt.js'
import { confirmChapterCreation, promptManualTimestamps } from './prompt.js'
import type { RunSettings } from './run-settings.js'
import { readCliOptions, resolveRunSettings } from './run-settings.js'
import { formatRunSummary } from './summary.js'

export type ResolvedTools = {
  ffmpeg: string
  ffprobe: string | null
  tesseract: string
}

export type SearchContext = {
  settings: RunSettings
  tools: ResolvedTools
  logger: RunLogger
  onProgress: (text: string) => void
}

export type RunnerDeps = {
  loadSchedule: (filePath: string) => Promise<ScheduleRow[]>
  resolveTool: typeof resolveToolPath
  createSearch: (context: SearchContext) => BoundarySearch
  probeFrameSize: typeof probeVideoDimensions
  writeChapters: typeof writeVideoChapters
}

type RunEnv = {
  env: Record<string, string | undefined>
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  /** Needed only when a prompt is shown. */
  ask?: Ask | null
  signal?: AbortSignal
  cwd?: string
  now?: () => Date
  deps?: Partial<RunnerDeps>
}

export function createDefaultSearch({
  settings,
  tools,
  logger,
  onProgress,
}: SearchContext): BoundarySearch {
  const recognize = createTesseractRecognizer({
    tesseractPath: tools.tesseract,
    language: settings.ocrLanguage,
    pageSegmentationMode: settings.pageSegmentationMode,
  })
  return createBoundarySearch({
    frames: createFfmpegFrameSource({ ffmpegPath: tools.ffmpeg, logger }),
    normalize: normalizeFrame,
    matcher: createTextMatcher({ recognize, logger }),
    logger,
    fps: settings.fps,
    workers: settings.workers,
    saveFramesDir: settings.saveFramesDir,
    onProgress,
  })
}

const defaultDeps: RunnerDeps = {
  loadSchedule: loadScheduleRows,
  resolveTool: resolveToolPath,
  createSearch: createDefaultSearch,
  probeFrameSize: probeVideoDimensions,
  writeChapters: writeVideoChapters,
}

export function resolveTools({
  env,
  config,
  resolveTool,
}: {
  env: Record<string, string | undefined>
  config: LectureChaptersConfig | null
  resolveTool: typeof resolveToolPath
}): ResolvedTools {
  const tools = config?.tools
  const ffmpeg = resolveTool({
    binary: 'ffmpeg',
    env,
    envKey: 'FFMPEG_PATH',
    configured: tools?.ffmpeg,
  })
  if (!ffmpeg) {
    throw new ConfigurationError(
      'ffmpeg not found (install it, set FFMPEG_PATH, or set tools.ffmpeg in the config file)'
    )
  }
  const tesseract = resolveTool({
    binary: 'tesseract',
    env,
    envKey: 'TESSERACT_PATH',
    configured: tools?.tesseract,
  })
  if (!tesseract) {
    throw new ConfigurationError(
      'tesseract not found (install it, set TESSERACT_PATH, or set tools.tesseract in the config file)'
    )
  }
  const ffprobe = resolveTool({
    binary: 'ffprobe',
    env,
    envKey: 'FFPROBE_PATH',
    configured: tools?.ffprobe,
  })
  return { ffmpeg, ffprobe, tesseract }
}

/** Exit code for an error that escaped `runCli`; user-facing text goes to stderr. */
export function reportCliError(error: unknown, stderr: NodeJS.WritableStream): number {
  if (error instanceof CommanderError) return error.exitCode
  if (error instanceof SearchAbortedError) {
    stderr.write(`\n${error.message}\n`)
    return 130
  }
  stderr.write(`Error: ${formatErrorMessage(error)}\n`)
  return 1
}

export async function runCli(
  argv: string[],
  { env, stdout, stderr, ask, signal, cwd = process.cwd(), now = () => new Date(), deps }: RunEnv
): Promise<void> {
  const { loadSchedule, resolveTool, createSearch, probeFrameSize, writeChapters } = {
    ...defaultDeps,
    ...deps,
  }
  const normalizedArgv = argv.filter((arg) => arg !== '--')

  if (handleHelpRequest({ normalizedArgv, stdout, stderr })) return
  if (await handleScheduleRequest({ normalizedArgv, stdout, stderr, loadSchedule })) return

  const program = attachHelpFooter(buildProgram())
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()

  if (normalizedArgv.includes('--version') || normalizedArgv.includes('-V')) {
    stdout.write(`${formatVersionLine()}\n`)
    return
  }

  try {
    program.parse(normalizedArgv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return
    }
    throw error
  }

  const [videoArg, scheduleArg] = program.args
  if (!videoArg || !scheduleArg) {
    throw new ConfigurationError('Expected <video> and <schedule> arguments')
  }

  const { config } = loadLectureChaptersConfig({ env })
  const settings = resolveRunSettings({
    videoPath: videoArg,
    schedulePath: scheduleArg,
    cli: readCliOptions(program.opts()),
    env,
    config,
    cwd,
  })

  const logging = createRunLogger(
    resolveRunLoggingConfig({
      config,
      videoPath: settings.videoPath,
      verbose: settings.verbose,
      now: now(),
      cwd,
    }),
    { mirror: settings.verbose ? (line) => stderr.write(`${line}\n`) : null }
  )
  const { logger } = logging

  try {
    if (logging.config) stderr.write(`Log file: ${logging.config.file}\n`)
    await runDiscovery({
      settings,
      config,
      env,
      logger,
      stdout,
      stderr,
      ask: ask ?? null,
      signal,
      deps: { loadSchedule, resolveTool, createSearch, probeFrameSize, writeChapters },
    })
  } catch (error) {
    if (error instanceof SearchAbortedError) {
      logger.warn(error.message)
    } else {
      logger.error('Run failed', error)
    }
    throw error
  } finally {
    await logging.flush()
  }
}

async function runDiscovery({
  settings,
  config,
  env,
  logger,
  stdout,
  stderr,
  ask,
  signal,
  deps,
}: {
  settings: RunSettings
  config: LectureChaptersConfig | null
  env: Record<string, string | undefined>
  logger: RunLogger
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  ask: Ask | null
  signal?: AbortSignal
  deps: RunnerDeps
}): Promise<void> {
  try {
    await access(settings.videoPath)
  } catch {
    throw new ConfigurationError(`Video not found: ${settings.videoPath}`)
  }
  const tools = resolveTools({ env, config, resolveTool: deps.resolveTool })
  logger.info(`Video: ${settings.videoPath}`)
  logger.debug(`Tools: ffmpeg=${tools.ffmpeg} tesseract=${tools.tesseract}`)

  const rows = await deps.loadSchedule(settings.schedulePath)
  const lectures = calculateEstimatedTimes(
    selectLectures(parseScheduleRows(rows, logger), settings.selection)
  )
  logger.info(`Lectures to process: ${lectures.map((l) => l.sequenceNumber).join(', ')}`)

  const onProgress = (text: string) => {
    stderr.write(`${text}\n`)
  }
  const hooks: DiscoveryHooks = {
    onLectureStart: ({ index, total, lecture, centerSeconds }) => {
      onProgress(
        `\n[${index + 1}/${total}] ${lecture.title} (around ${formatHms(centerSeconds)})`
      )
    },
  }
  const frameSize = settings.crop
    ? await deps.probeFrameSize({
        ffprobePath: tools.ffprobe,
        videoPath: settings.videoPath,
        logger,
      })
    : null
  if (frameSize) logger.debug(`Frame size: ${frameSize.width}x${frameSize.height}`)
  const search = deps.createSearch({ settings, tools, logger, onProgress })

  let entries = await discoverTimestamps({
    videoPath: settings.videoPath,
    lectures,
    windowSeconds: settings.windowSeconds,
    crop: settings.crop,
    frameSize,
    truncateLength: settings.truncateLength,
    stripPrefix: settings.stripPrefix,
    search,
    logger,
    hooks,
    signal,
  })

  const csvPath = await writeTimestampsCsv(entries, settings.csvPath)
  logger.info(`Timestamps exported to ${csvPath}`)
  stdout.write(`Timestamps exported to ${csvPath}\n\n`)
  stdout.write(`${formatRunSummary(entries)}\n`)

  if (!settings.writeChapters) return

  const hasMissing = entries.some((entry) => !entry.found)
  if (hasMissing && settings.prompt) {
    if (!ask) throw new ConfigurationError('Interactive input is unavailable; use --no-prompt')
    const write = (text: string) => {
      stdout.write(text)
    }
    entries = await promptManualTimestamps(entries, { ask, write })
    if (!(await confirmChapterCreation(ask))) {
      logger.info('Chapter creation cancelled by user')
      stdout.write('Chapter creation cancelled.\n')
      return
    }
  }

  const chapters = buildChapters(entries)
  const output = await deps.writeChapters({
    ffmpegPath: tools.ffmpeg,
    ffprobePath: tools.ffprobe,
    videoPath: settings.videoPath,
    chapters,
    outputPath: settings.chaptersOutput,
    logger,
    signal,
  })
  if (output) {
    stdout.write(`Chapters written to ${output}\n`)
  } else {
    stderr.write('No lectures found; chapters not written.\n')
  }
}
