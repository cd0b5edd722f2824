import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import {
  loadLectureChaptersConfig,
  parseLectureChaptersConfig,
  resolveConfigPath,
} from '../src/config.js'
import { ConfigurationError } from '../src/errors.js'

describe('config', () => {
  it('prefers LECTURE_CHAPTERS_CONFIG over the home directory', () => {
    expect(resolveConfigPath({ LECTURE_CHAPTERS_CONFIG: ' /etc/lc.json ', HOME: '/home/a' })).toBe(
      '/etc/lc.json'
    )
    expect(resolveConfigPath({ HOME: '/home/a' })).toBe(
      join('/home/a', '.lecture-chapters', 'config.json')
    )
    expect(resolveConfigPath({})).toBeNull()
  })

  it('parses JSON5 with comments and drops empty sections', () => {
    const config = parseLectureChaptersConfig(
      `{
        // local overrides
        tools: { ffmpeg: ' /opt/ffmpeg ', tesseract: '' },
        search: { windowSeconds: 120, crop: { left: 0, top: 70, right: 100, bottom: 100 } },
        ocr: {},
        logging: { level: 'DEBUG', format: 'json', enabled: true },
        output: { csv: 'out.csv' },
      }`,
      'config.json'
    )

    expect(config).toEqual({
      tools: { ffmpeg: '/opt/ffmpeg' },
      search: { windowSeconds: 120, crop: { left: 0, top: 70, right: 100, bottom: 100 } },
      logging: { enabled: true, level: 'debug', format: 'json' },
      output: { csv: 'out.csv' },
    })
  })

  it('accepts crop as an array', () => {
    expect(parseLectureChaptersConfig('{"search":{"crop":[10,20,90,80]}}', 'c.json')).toEqual({
      search: { crop: { left: 10, top: 20, right: 90, bottom: 80 } },
    })
  })

  it('reports invalid values with the file path', () => {
    expect(() => parseLectureChaptersConfig('{ search: { workers: 2.5 } }', 'c.json')).toThrow(
      'Invalid config file c.json: "search.workers" must be an integer.'
    )
    expect(() => parseLectureChaptersConfig('{ search: { fps: 120 } }', 'c.json')).toThrow(
      'Invalid config file c.json: "search.fps" must be between 0.01 and 60.'
    )
    expect(() => parseLectureChaptersConfig('{ search: { crop: [50, 0, 40, 100] } }', 'c.json')).toThrow(
      'Invalid config file c.json: "search.crop" right/bottom must be greater than left/top.'
    )
    expect(() => parseLectureChaptersConfig('{ logging: { format: "xml" } }', 'c.json')).toThrow(
      'Invalid config file c.json: "logging.format" must be one of "json" or "pretty".'
    )
    expect(() => parseLectureChaptersConfig('[]', 'c.json')).toThrow(
      'Invalid config file c.json: expected an object at the top level'
    )
  })

  it('wraps syntax errors in a ConfigurationError', () => {
    expect(() => parseLectureChaptersConfig('{ nope', 'c.json')).toThrow(ConfigurationError)
    expect(() => parseLectureChaptersConfig('{ nope', 'c.json')).toThrow(
      /^Invalid JSON in config file c\.json: /
    )
  })

  it('treats a missing file as no config', () => {
    const home = mkdtempSync(join(tmpdir(), 'lecture-chapters-home-'))
    expect(loadLectureChaptersConfig({ env: { HOME: home } })).toEqual({
      config: null,
      path: join(home, '.lecture-chapters', 'config.json'),
    })
  })

  it('loads the file named by the environment', () => {
    const dir = mkdtempSync(join(tmpdir(), 'lecture-chapters-config-'))
    const file = join(dir, 'config.json')
    writeFileSync(file, '{ ocr: { language: "eng+ita", psm: 6 } }')

    expect(loadLectureChaptersConfig({ env: { LECTURE_CHAPTERS_CONFIG: file } })).toEqual({
      config: { ocr: { language: 'eng+ita', psm: 6 } },
      path: file,
    })
  })
})
