import sharp from 'sharp'

import { resolveCropBox } from './crop.js'
import type { CropRegion, NormalizedImage } from './types.js'

export const CONTRAST_FACTOR = 2
export const UPSCALE_FACTOR = 2

/**
 * Prepares a frame for OCR: optional percentage crop, luminance, contrast
 * stretched around the mean, sharpen, then a 2x Lanczos upscale.
 *
 * Each step is a separate sharp pass: inside one pipeline sharp resizes
 * before it sharpens.
 */
export async function normalizeFrame(
  png: Buffer,
  crop?: CropRegion | null
): Promise<NormalizedImage> {
  let source = sharp(png)
  if (crop) {
    const { width, height } = await source.metadata()
    if (!width || !height) throw new Error('Frame has no readable dimensions')
    source = source.extract(resolveCropBox(crop, width, height))
  }

  const gray = await source.removeAlpha().grayscale().raw().toBuffer({ resolveWithObject: true })
  const raw = {
    width: gray.info.width,
    height: gray.info.height,
    channels: gray.info.channels,
  }

  const stats = await sharp(gray.data, { raw }).stats()
  const mean = Math.round(stats.channels[0]?.mean ?? 0)
  const contrasted = await sharp(gray.data, { raw })
    .linear(CONTRAST_FACTOR, mean * (1 - CONTRAST_FACTOR))
    .raw()
    .toBuffer()
  const sharpened = await sharp(contrasted, { raw }).sharpen().raw().toBuffer()
  const output = await sharp(sharpened, { raw })
    .resize(raw.width * UPSCALE_FACTOR, raw.height * UPSCALE_FACTOR, { kernel: 'lanczos3' })
    .png()
    .toBuffer({ resolveWithObject: true })

  return { png: output.data, width: output.info.width, height: output.info.height }
}
