/** Percentages of the frame, 0-100, with left < right and top < bottom. */
export type CropRegion = {
  left: number
  top: number
  right: number
  bottom: number
}

export type PixelBox = {
  left: number
  top: number
  width: number
  height: number
}

export type NormalizedImage = {
  png: Buffer
  width: number
  height: number
}

export type ImageNormalizer = (png: Buffer, crop?: CropRegion | null) => Promise<NormalizedImage>

export type TextRecognizer = (image: NormalizedImage, signal?: AbortSignal) => Promise<string>

export type TextMatcher = (
  image: NormalizedImage,
  targetText: string,
  signal?: AbortSignal
) => Promise<boolean>
