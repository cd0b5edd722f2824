export type LectureKind = 'video' | 'document' | 'other'

export type Lecture = {
  kind: LectureKind
  title: string
  estimatedDurationMinutes: number
  /** 1-based position across the whole schedule (section rows excluded). */
  sequenceNumber: number
  sectionNumber: number
  estimatedStartMinutes: number
  estimatedEndMinutes: number
}

export type ScheduleRow = {
  type: string
  title: string
  duration: string | number | null
}

export type LectureRange = {
  start: number | null
  end: number | null
}

export type LectureSelection =
  | { kind: 'all' }
  | { kind: 'lectures'; range: LectureRange }
  | { kind: 'sections'; range: LectureRange }
