import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import { createLogFileWriter } from '../src/logging/log-file.js'
import {
  createRunLogger,
  formatPrettyLine,
  resolveRunLogPath,
  resolveRunLoggingConfig,
} from '../src/logging/run-logger.js'

const now = new Date(2024, 2, 5, 7, 8, 9)

describe('run logging', () => {
  it('names the log after the video and the start time', () => {
    expect(
      resolveRunLogPath({ videoPath: '/videos/week 1.mp4', dir: null, now, cwd: '/work' })
    ).toBe(join('/work', 'logs', 'week 1_20240305_070809.log'))
    expect(resolveRunLogPath({ videoPath: 'a.mkv', dir: '/var/log/lc', now, cwd: '/work' })).toBe(
      join('/var/log/lc', 'a_20240305_070809.log')
    )
  })

  it('raises the level to debug when verbose', () => {
    const config = { logging: { level: 'warn' as const, format: 'json' as const } }
    expect(
      resolveRunLoggingConfig({ config, videoPath: 'a.mp4', verbose: true, now, cwd: '/w' })
    ).toEqual({ level: 'debug', format: 'json', file: join('/w', 'logs', 'a_20240305_070809.log') })
    expect(
      resolveRunLoggingConfig({ config: null, videoPath: 'a.mp4', verbose: false, now, cwd: '/w' })
    ).toEqual({ level: 'info', format: 'pretty', file: join('/w', 'logs', 'a_20240305_070809.log') })
  })

  it('returns no file logging when disabled', async () => {
    const resolved = resolveRunLoggingConfig({
      config: { logging: { enabled: false } },
      videoPath: 'a.mp4',
      verbose: true,
      now,
      cwd: '/w',
    })
    expect(resolved).toBeNull()

    const logging = createRunLogger(resolved)
    logging.logger.info('ignored')
    expect(logging.config).toBeNull()
    await expect(logging.flush()).resolves.toBeUndefined()
  })

  it('writes pretty lines to the file and the mirror', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'lecture-chapters-log-'))
    const file = join(dir, 'nested', 'run.log')
    const mirrored: string[] = []
    const logging = createRunLogger(
      { level: 'info', format: 'pretty', file },
      { mirror: (line) => mirrored.push(line) }
    )

    logging.logger.debug('hidden detail')
    logging.logger.info('Video: a.mp4')
    await logging.flush()

    const pattern = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2},\d+ - INFO - Video: a\.mp4$/
    expect(mirrored).toHaveLength(1)
    expect(mirrored[0]).toMatch(pattern)
    expect(readFileSync(file, 'utf8')).toBe(`${mirrored[0]}\n`)
  })

  it('writes one JSON object per line in json mode', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'lecture-chapters-log-'))
    const file = join(dir, 'run.log')
    const logging = createRunLogger({ level: 'warn', format: 'json', file })

    logging.logger.info('skipped')
    logging.logger.warn('Not found: Setup')
    await logging.flush()

    const lines = readFileSync(file, 'utf8').trimEnd().split('\n')
    expect(lines).toHaveLength(1)
    const parsed: unknown = JSON.parse(lines[0] ?? '')
    expect(parsed).toMatchObject({ 0: 'Not found: Setup', _meta: { logLevelName: 'WARN' } })
  })

  it('joins arguments and error blocks in pretty lines', () => {
    expect(
      formatPrettyLine({ metaMarkup: 'META - ', args: ['Run failed', { code: 2 }], errors: [] })
    ).toBe('META - Run failed {"code":2}')
    expect(formatPrettyLine({ metaMarkup: '', args: [], errors: ['Error: boom', 'at x'] })).toBe(
      'Error: boom\nat x'
    )
  })
})

describe('log file writer', () => {
  it('appends lines in order and adds missing newlines', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'lecture-chapters-log-'))
    const writer = createLogFileWriter(join(dir, 'a', 'b.log'))

    writer.write('first')
    writer.write('second\n')
    writer.write('third')
    await writer.flush()

    expect(readFileSync(writer.filePath, 'utf8')).toBe('first\nsecond\nthird\n')
  })

  it('reports the first write failure on flush', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'lecture-chapters-log-'))
    const writer = createLogFileWriter(dir)

    writer.write('cannot append to a directory')

    await expect(writer.flush()).rejects.toThrow()
  })
})
