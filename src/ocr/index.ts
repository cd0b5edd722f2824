export { formatCropRegion, parseCropArgs, resolveCropBox, validateCropRegion } from './crop.js'
export { containsText, createTextMatcher } from './matcher.js'
export { CONTRAST_FACTOR, normalizeFrame, UPSCALE_FACTOR } from './normalize.js'
export type { TesseractOptions } from './tesseract.js'
export { buildTesseractArgs, createTesseractRecognizer, runTesseract } from './tesseract.js'
export type {
  CropRegion,
  ImageNormalizer,
  NormalizedImage,
  PixelBox,
  TextMatcher,
  TextRecognizer,
} from './types.js'
