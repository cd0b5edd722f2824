export { parseDurationMinutes } from './duration.js'
export {
  calculateEstimatedTimes,
  compareLectures,
  describeRange,
  parseRange,
  parseScheduleRows,
  resolveLectureKind,
  selectLectures,
} from './parser.js'
export { formatScheduleSummary } from './summary.js'
export type { Lecture, LectureKind, LectureRange, LectureSelection, ScheduleRow } from './types.js'
export { loadScheduleRows, readWorksheet } from './workbook.js'
