import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'

import { CommanderError } from 'commander'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { BoundarySearch } from '../src/discovery/types.js'
import { buildSearchWindow } from '../src/discovery/window.js'
import { ConfigurationError, SearchAbortedError } from '../src/errors.js'
import type { RunnerDeps } from '../src/run/runner.js'
import { reportCliError, runCli } from '../src/run/runner.js'
import type { ScheduleRow } from '../src/schedule/types.js'

function collect() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { stream, text: () => chunks.join('') }
}

const rows: ScheduleRow[] = [
  { type: 'section', title: 'Getting started', duration: null },
  { type: 'video', title: 'Welcome', duration: 10 },
  { type: 'video', title: 'Setup', duration: '10 min' },
]

function scriptedSearch(found: Record<string, number>): BoundarySearch {
  return async (request) => {
    const window = buildSearchWindow(request.centerSeconds, request.windowSeconds)
    const timestamp = found[request.targetText]
    if (timestamp === undefined) {
      return { state: 'exhausted', framesScanned: 0, elapsedMs: 0, window }
    }
    return {
      state: 'found',
      timestamp,
      frameIndex: 0,
      framesScanned: 1,
      elapsedMs: 0,
      window,
      savedFrames: [],
    }
  }
}

let cwd = ''
let env: Record<string, string | undefined> = {}
const writeChapters = vi.fn<RunnerDeps['writeChapters']>()

function deps(overrides: Partial<RunnerDeps> = {}): Partial<RunnerDeps> {
  return {
    loadSchedule: async () => rows,
    resolveTool: ({ binary }) => `/bin/${binary}`,
    createSearch: () => scriptedSearch({ Welcome: 5 }),
    writeChapters,
    ...overrides,
  }
}

async function run(
  argv: string[],
  options: { ask?: (question: string) => Promise<string>; overrides?: Partial<RunnerDeps> } = {}
) {
  const stdout = collect()
  const stderr = collect()
  await runCli(argv, {
    env,
    stdout: stdout.stream,
    stderr: stderr.stream,
    ask: options.ask ?? null,
    cwd,
    now: () => new Date(2024, 0, 2, 3, 4, 5),
    deps: deps(options.overrides),
  })
  return { stdout: stdout.text(), stderr: stderr.text() }
}

describe('cli runner', () => {
  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'lecture-chapters-cli-'))
    writeFileSync(join(cwd, 'course.mp4'), 'not really a video')
    const configPath = join(cwd, 'config.json')
    writeFileSync(configPath, '{ logging: { enabled: false } }')
    env = { LECTURE_CHAPTERS_CONFIG: configPath }
    writeChapters.mockReset()
    writeChapters.mockResolvedValue(join(cwd, 'course_chapters.mp4'))
  })

  it('prints the version', async () => {
    const { stdout } = await run(['--version'])
    expect(stdout).toBe('lecture-chapters 0.1.0\n')
  })

  it('prints help with the examples footer', async () => {
    const { stdout } = await run(['help'])
    expect(stdout).toContain('Usage: lecture-chapters [options] <video> <schedule>')
    expect(stdout).toContain('LECTURE_CHAPTERS_OCR_WORKERS  optional default for --workers')
  })

  it('searches, exports the CSV and writes chapters without prompting', async () => {
    const { stdout, stderr } = await run(['course.mp4', 'schedule.xlsx', '--no-prompt'])

    const csvPath = join(cwd, 'timestamps.csv')
    expect(stdout).toBe(
      [
        `Timestamps exported to ${csvPath}`,
        '',
        '=== Search summary ===',
        'Lectures processed: 2',
        'Found: 1',
        '  Lecture numbers: 1',
        'Not found: 1',
        '  Lecture numbers: 2',
        '==============================',
        `Chapters written to ${join(cwd, 'course_chapters.mp4')}`,
        '',
      ].join('\n')
    )
    expect(stderr).toBe(
      '\n[1/2] Welcome (around 00:00:00.00)\n\n[2/2] Setup (around 00:10:05.00)\n'
    )
    expect(readFileSync(csvPath, 'utf8')).toBe(
      'Section,Lecture,Title,Start,End,Duration,Found\r\n' +
        '1,1,Welcome,00:00:05.00,00:10:05.00,00:10:00.00,Yes\r\n' +
        '1,2,Setup,00:10:05.00,00:20:05.00,00:10:00.00,No\r\n'
    )
    expect(writeChapters).toHaveBeenCalledTimes(1)
    expect(writeChapters.mock.calls[0]?.[0]).toMatchObject({
      ffmpegPath: '/bin/ffmpeg',
      ffprobePath: '/bin/ffprobe',
      videoPath: join(cwd, 'course.mp4'),
      chapters: [{ startMillis: 5000, endMillis: 605000, title: 'Welcome' }],
      outputPath: null,
    })
  })

  it('asks for missing starts and writes them as chapters after confirmation', async () => {
    const answers = ['00:10:00', 'y']
    const ask = vi.fn(async (_question: string) => answers.shift() ?? '')

    const { stdout } = await run(['course.mp4', 'schedule.xlsx'], { ask })

    expect(ask).toHaveBeenCalledTimes(2)
    expect(ask).toHaveBeenLastCalledWith('\nProceed with chapter creation? (y/n): ')
    expect(stdout).toContain('\nLectures not found:\n2. Setup\n')
    expect(stdout).toContain('Start set to 00:10:00.00\n')
    expect(writeChapters.mock.calls[0]?.[0].chapters).toEqual([
      { startMillis: 5000, endMillis: 605000, title: 'Welcome' },
      { startMillis: 600000, endMillis: 1200000, title: 'Setup' },
    ])
  })

  it('stops when chapter creation is declined', async () => {
    const answers = ['', 'n']
    const ask = vi.fn(async (_question: string) => answers.shift() ?? '')

    const { stdout } = await run(['course.mp4', 'schedule.xlsx'], { ask })

    expect(stdout.endsWith('Chapter creation cancelled.\n')).toBe(true)
    expect(writeChapters).not.toHaveBeenCalled()
  })

  it('needs --no-prompt when no interactive input exists', async () => {
    await expect(run(['course.mp4', 'schedule.xlsx'])).rejects.toThrow(
      'Interactive input is unavailable; use --no-prompt'
    )
  })

  it('skips prompts and chapters with --no-chapters', async () => {
    const ask = vi.fn(async (_question: string) => '')

    const { stdout } = await run(['course.mp4', 'schedule.xlsx', '--no-chapters'], { ask })

    expect(stdout.endsWith('==============================\n')).toBe(true)
    expect(ask).not.toHaveBeenCalled()
    expect(writeChapters).not.toHaveBeenCalled()
  })

  it('reports when no lecture was found', async () => {
    writeChapters.mockResolvedValue(null)

    const { stderr } = await run(['course.mp4', 'schedule.xlsx', '--no-prompt'], {
      overrides: { createSearch: () => scriptedSearch({}) },
    })

    expect(stderr.endsWith('No lectures found; chapters not written.\n')).toBe(true)
  })

  it('rejects a crop that is empty at the probed frame size before searching', async () => {
    const search = vi.fn<BoundarySearch>()
    const probeFrameSize = vi.fn<RunnerDeps['probeFrameSize']>(async () => ({
      width: 100,
      height: 50,
    }))

    await expect(
      run(['course.mp4', 'schedule.xlsx', '--no-prompt', '--crop', '0', '0', '0.5', '100'], {
        overrides: { createSearch: () => search, probeFrameSize },
      })
    ).rejects.toThrow('Crop area L=0% T=0% R=0.5% B=100% is empty for a 100x50 frame')
    expect(probeFrameSize.mock.calls[0]?.[0]).toMatchObject({
      ffprobePath: '/bin/ffprobe',
      videoPath: join(cwd, 'course.mp4'),
    })
    expect(search).not.toHaveBeenCalled()
  })

  it('fails early for a missing video', async () => {
    await expect(run(['missing.mp4', 'schedule.xlsx'])).rejects.toThrow(
      `Video not found: ${join(cwd, 'missing.mp4')}`
    )
  })

  it('fails when ffmpeg cannot be found', async () => {
    await expect(
      run(['course.mp4', 'schedule.xlsx'], {
        overrides: { resolveTool: ({ binary }) => (binary === 'ffmpeg' ? null : `/bin/${binary}`) },
      })
    ).rejects.toThrow(ConfigurationError)
  })

  it('propagates an interrupted search', async () => {
    await expect(
      run(['course.mp4', 'schedule.xlsx', '--no-prompt'], {
        overrides: {
          createSearch: () => async () => {
            throw new SearchAbortedError('Interrupted by user')
          },
        },
      })
    ).rejects.toThrow(SearchAbortedError)
  })

  it('writes a run log when logging is enabled', async () => {
    env = { HOME: cwd }

    const { stderr } = await run(['course.mp4', 'schedule.xlsx', '--no-prompt'])

    const logPath = join(cwd, 'logs', 'course_20240102_030405.log')
    expect(stderr.startsWith(`Log file: ${logPath}\n`)).toBe(true)
    expect(readFileSync(logPath, 'utf8')).toContain(` - INFO - Video: ${join(cwd, 'course.mp4')}\n`)
  })

  it('prints the parsed schedule for the schedule command', async () => {
    const all = await run(['schedule', 'schedule.xlsx'])
    expect(all.stdout).toContain(' 1. 2  00:10:00    00:20:00    Setup')
    expect(all.stdout.endsWith('Total: 2 lectures, 0h 20m total duration\n')).toBe(true)

    const one = await run(['schedule', 'schedule.xlsx', '-r', '2'])
    expect(one.stdout.endsWith('Total: 1 lectures, 0h 10m total duration\n')).toBe(true)
  })
})

describe('reportCliError', () => {
  it('maps errors to exit codes', () => {
    const stderr = collect()

    expect(reportCliError(new SearchAbortedError('Interrupted by user'), stderr.stream)).toBe(130)
    expect(reportCliError(new Error('boom'), stderr.stream)).toBe(1)
    expect(reportCliError(new CommanderError(2, 'commander.unknownOption', 'x'), stderr.stream)).toBe(
      2
    )
    expect(stderr.text()).toBe('\nInterrupted by user\nError: boom\n')
  })
})
