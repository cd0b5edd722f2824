export type VideoFrame = {
  /** Position of the frame inside its window, starting at 0. */
  index: number
  /** Seconds from the start of the video. */
  timestamp: number
  png: Buffer
}

export type FrameSize = {
  width: number
  height: number
}

export type SearchWindow = {
  centerSeconds: number
  requestedSeconds: number
  startSeconds: number
  endSeconds: number
  durationSeconds: number
}

export type FrameStreamRequest = {
  videoPath: string
  window: SearchWindow
  fps: number
  signal?: AbortSignal
}

/** Lazy, forward-only frames for one window; every call decodes independently. */
export type FrameSource = (request: FrameStreamRequest) => AsyncIterable<VideoFrame>
