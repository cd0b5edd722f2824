import type { CropRegion } from '../ocr/types.js'
import type { Lecture } from '../schedule/types.js'
import type { SearchWindow } from '../video/types.js'

export type BoundarySearchState = 'scanning' | 'found' | 'exhausted'

export type BoundarySearchRequest = {
  videoPath: string
  centerSeconds: number
  windowSeconds: number
  targetText: string
  crop?: CropRegion | null
  signal?: AbortSignal
}

export type BoundarySearchFound = {
  state: 'found'
  timestamp: number
  frameIndex: number
  framesScanned: number
  elapsedMs: number
  window: SearchWindow
  savedFrames: string[]
}

export type BoundarySearchExhausted = {
  state: 'exhausted'
  framesScanned: number
  elapsedMs: number
  window: SearchWindow
}

export type BoundarySearchResult = BoundarySearchFound | BoundarySearchExhausted

export type BoundarySearch = (request: BoundarySearchRequest) => Promise<BoundarySearchResult>

/** One row of the timestamp table. Lecture fields are copied, never shared. */
export type TimestampEntry = {
  lecture: Readonly<Lecture>
  searchText: string
  searchCenterSeconds: number
  windowSeconds: number
  startSeconds: number
  endSeconds: number
  found: boolean
}

export type LectureSearchStart = {
  index: number
  total: number
  lecture: Lecture
  searchText: string
  centerSeconds: number
  windowSeconds: number
}

export type DiscoveryHooks = {
  onLectureStart?: ((info: LectureSearchStart) => void) | null
  onLectureDone?: ((info: { index: number; total: number; entry: TimestampEntry }) => void) | null
  onEntryCorrected?: ((info: { index: number; entry: TimestampEntry }) => void) | null
}
