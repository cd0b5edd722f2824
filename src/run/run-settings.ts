import path from 'node:path'

import type { OptionValues } from 'commander'

import type { LectureChaptersConfig } from '../config.js'
import { DEFAULT_FPS, DEFAULT_OCR_WORKERS } from '../discovery/boundary-search.js'
import { ConfigurationError } from '../errors.js'
import { parseFps, parseTruncate, parseWindowSeconds, parseWorkers } from '../flags.js'
import { parseCropArgs } from '../ocr/crop.js'
import type { CropRegion } from '../ocr/types.js'
import { parseRange } from '../schedule/parser.js'
import type { LectureSelection } from '../schedule/types.js'

export const DEFAULT_WINDOW_SECONDS = 90
export const DEFAULT_CSV_PATH = 'timestamps.csv'
export const DEFAULT_OCR_LANGUAGE = 'eng'
export const DEFAULT_PAGE_SEGMENTATION_MODE = 3

export type CliOptions = {
  range: string | null
  section: string | null
  output: string | null
  window: string | null
  crop: string[] | null
  truncate: string | null
  stripPrefix: boolean
  fps: string | null
  workers: string | null
  saveFrames: string | boolean
  chaptersOutput: string | null
  chapters: boolean
  prompt: boolean
  verbose: boolean
}

export type RunSettings = {
  videoPath: string
  schedulePath: string
  selection: LectureSelection
  csvPath: string
  windowSeconds: number
  crop: CropRegion | null
  truncateLength: number | null
  stripPrefix: boolean
  fps: number
  workers: number
  saveFramesDir: string | null
  chaptersOutput: string | null
  writeChapters: boolean
  prompt: boolean
  verbose: boolean
  ocrLanguage: string
  pageSegmentationMode: number
}

function stringOption(opts: OptionValues, key: string): string | null {
  const value: unknown = opts[key]
  return typeof value === 'string' ? value : null
}

function booleanOption(opts: OptionValues, key: string, fallback: boolean): boolean {
  const value: unknown = opts[key]
  return typeof value === 'boolean' ? value : fallback
}

export function readCliOptions(opts: OptionValues): CliOptions {
  const crop: unknown = opts.crop
  const saveFrames: unknown = opts.saveFrames
  return {
    range: stringOption(opts, 'range'),
    section: stringOption(opts, 'section'),
    output: stringOption(opts, 'output'),
    window: stringOption(opts, 'window'),
    crop: Array.isArray(crop) ? crop.map((value: unknown) => String(value)) : null,
    truncate: stringOption(opts, 'truncate'),
    stripPrefix: booleanOption(opts, 'stripPrefix', false),
    fps: stringOption(opts, 'fps'),
    workers: stringOption(opts, 'workers'),
    saveFrames: typeof saveFrames === 'string' || typeof saveFrames === 'boolean' ? saveFrames : false,
    chaptersOutput: stringOption(opts, 'chaptersOutput'),
    chapters: booleanOption(opts, 'chapters', true),
    prompt: booleanOption(opts, 'prompt', true),
    verbose: booleanOption(opts, 'verbose', false),
  }
}

export function resolveSelection({
  range,
  section,
}: Pick<CliOptions, 'range' | 'section'>): LectureSelection {
  if (range && section) {
    throw new ConfigurationError('Use either --range or --section (not both).')
  }
  if (range) return { kind: 'lectures', range: parseRange(range, '--range') }
  if (section) return { kind: 'sections', range: parseRange(section, '--section') }
  return { kind: 'all' }
}

function resolveWorkers(
  cli: string | null,
  env: Record<string, string | undefined>,
  configured: number | undefined
): number {
  if (cli) return parseWorkers(cli)
  const fromEnv = env.LECTURE_CHAPTERS_OCR_WORKERS?.trim()
  if (fromEnv) return parseWorkers(fromEnv)
  return configured ?? DEFAULT_OCR_WORKERS
}

/** CLI flag > environment > config file > default. */
export function resolveRunSettings({
  videoPath,
  schedulePath,
  cli,
  env,
  config,
  cwd,
}: {
  videoPath: string
  schedulePath: string
  cli: CliOptions
  env: Record<string, string | undefined>
  config: LectureChaptersConfig | null
  cwd: string
}): RunSettings {
  const search = config?.search
  const saveFramesDir =
    typeof cli.saveFrames === 'string'
      ? path.resolve(cwd, cli.saveFrames)
      : cli.saveFrames
        ? cwd
        : null

  return {
    videoPath: path.resolve(cwd, videoPath),
    schedulePath: path.resolve(cwd, schedulePath),
    selection: resolveSelection(cli),
    csvPath: path.resolve(cwd, cli.output ?? config?.output?.csv ?? DEFAULT_CSV_PATH),
    windowSeconds: cli.window
      ? parseWindowSeconds(cli.window)
      : (search?.windowSeconds ?? DEFAULT_WINDOW_SECONDS),
    crop: cli.crop ? parseCropArgs(cli.crop) : (search?.crop ?? null),
    truncateLength: cli.truncate ? parseTruncate(cli.truncate) : (search?.truncate ?? null),
    stripPrefix: cli.stripPrefix || search?.stripPrefix === true,
    fps: cli.fps ? parseFps(cli.fps) : (search?.fps ?? DEFAULT_FPS),
    workers: resolveWorkers(cli.workers, env, search?.workers),
    saveFramesDir,
    chaptersOutput: cli.chaptersOutput ? path.resolve(cwd, cli.chaptersOutput) : null,
    writeChapters: cli.chapters,
    prompt: cli.prompt,
    verbose: cli.verbose,
    ocrLanguage: config?.ocr?.language ?? DEFAULT_OCR_LANGUAGE,
    pageSegmentationMode: config?.ocr?.psm ?? DEFAULT_PAGE_SEGMENTATION_MODE,
  }
}
