import { ConfigurationError } from '../errors.js'
import type { CropRegion, PixelBox } from './types.js'

export function formatCropRegion(crop: CropRegion): string {
  return `L=${crop.left}% T=${crop.top}% R=${crop.right}% B=${crop.bottom}%`
}

/** Throws before any frame is decoded when the rectangle cannot be used. */
export function validateCropRegion(crop: CropRegion): CropRegion {
  const values = [crop.left, crop.top, crop.right, crop.bottom]
  if (!values.every((value) => Number.isFinite(value) && value >= 0 && value <= 100)) {
    throw new ConfigurationError(
      `Invalid crop area (${formatCropRegion(crop)}): values must be percentages between 0 and 100`
    )
  }
  if (crop.left >= crop.right || crop.top >= crop.bottom) {
    throw new ConfigurationError(
      `Invalid crop area (${formatCropRegion(crop)}): right/bottom must be greater than left/top`
    )
  }
  return crop
}

export function parseCropArgs(raw: readonly string[]): CropRegion {
  if (raw.length !== 4) {
    throw new ConfigurationError('--crop expects 4 values: LEFT TOP RIGHT BOTTOM')
  }
  const values = raw.map((value) => {
    const numeric = Number(value.trim())
    if (!value.trim() || !Number.isFinite(numeric)) {
      throw new ConfigurationError(`Invalid --crop value: ${value}`)
    }
    return numeric
  })
  return validateCropRegion({
    left: values[0],
    top: values[1],
    right: values[2],
    bottom: values[3],
  })
}

/**
 * Resolves percentages against the frame size, truncating to whole pixels.
 * An empty box is a ConfigurationError: no frame of this size can be read.
 */
export function resolveCropBox(crop: CropRegion, width: number, height: number): PixelBox {
  const left = Math.trunc((width * crop.left) / 100)
  const top = Math.trunc((height * crop.top) / 100)
  const right = Math.trunc((width * crop.right) / 100)
  const bottom = Math.trunc((height * crop.bottom) / 100)
  const box = { left, top, width: right - left, height: bottom - top }
  if (box.width <= 0 || box.height <= 0) {
    throw new ConfigurationError(
      `Crop area ${formatCropRegion(crop)} is empty for a ${width}x${height} frame`
    )
  }
  return box
}
