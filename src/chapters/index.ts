export {
  buildRemuxArgs,
  extractContainerMetadata,
  resolveChaptersOutputPath,
  writeVideoChapters,
} from './ffmpeg.js'
export type { Chapter } from './metadata.js'
export {
  buildChapters,
  escapeMetadataValue,
  FFMETADATA_HEADER,
  renderChapterMetadata,
} from './metadata.js'
