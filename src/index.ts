export * from './chapters/index.js'
export type { LectureChaptersConfig } from './config.js'
export { loadLectureChaptersConfig, parseLectureChaptersConfig } from './config.js'
export * from './discovery/index.js'
export { ConfigurationError, ScheduleError, SearchAbortedError } from './errors.js'
export { renderTimestampsCsv, writeTimestampsCsv } from './export/csv.js'
export type { RunLogger } from './logging/run-logger.js'
export { createRunLogger, resolveRunLoggingConfig } from './logging/run-logger.js'
export * from './ocr/index.js'
export { runCli } from './run/runner.js'
export * from './schedule/index.js'
export { formatHms } from './time.js'
export * from './video/index.js'
