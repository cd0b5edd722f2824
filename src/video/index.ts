export { buildFrameExtractionArgs, createFfmpegFrameSource, extractFrames } from './frames.js'
export { PNG_SIGNATURE, PngStreamParser } from './png-stream.js'
export {
  parseProbeDimensions,
  parseProbeDuration,
  probeVideoDimensions,
  probeVideoDuration,
} from './probe.js'
export { resolveExecutableInPath, resolveToolPath, runProcessCapture } from './process.js'
export type {
  FrameSize,
  FrameSource,
  FrameStreamRequest,
  SearchWindow,
  VideoFrame,
} from './types.js'
