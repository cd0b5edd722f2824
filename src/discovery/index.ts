export type { BoundarySearchDeps } from './boundary-search.js'
export {
  buildFrameFileNames,
  clampWorkers,
  createBoundarySearch,
  DEFAULT_FPS,
  DEFAULT_OCR_WORKERS,
  searchBoundary,
} from './boundary-search.js'
export type { DiscoverTimestampsOptions } from './schedule-walker.js'
export {
  discoverTimestamps,
  DOCUMENT_WINDOW_BONUS_SECONDS,
  resolveLectureWindow,
} from './schedule-walker.js'
export { deriveSearchText, stripTitlePrefix } from './search-text.js'
export type {
  BoundarySearch,
  BoundarySearchRequest,
  BoundarySearchResult,
  BoundarySearchState,
  DiscoveryHooks,
  TimestampEntry,
} from './types.js'
export { buildSearchWindow } from './window.js'
