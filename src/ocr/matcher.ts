import type { Logger } from 'tslog'

import { formatErrorMessage } from '../errors.js'
import type { TextMatcher, TextRecognizer } from './types.js'

/** Case-insensitive substring test; no fuzzy matching. */
export function containsText(recognized: string, target: string): boolean {
  return recognized.toLowerCase().includes(target.toLowerCase())
}

/**
 * Wraps a recognizer. A failed recognition is logged and counts as no match
 * so the search moves on to the next frame.
 */
export function createTextMatcher({
  recognize,
  logger,
}: {
  recognize: TextRecognizer
  logger: Logger<Record<string, unknown>>
}): TextMatcher {
  return async (image, targetText, signal) => {
    try {
      const text = await recognize(image, signal)
      return containsText(text, targetText)
    } catch (error) {
      if (signal?.aborted) {
        logger.debug(`OCR cancelled: ${formatErrorMessage(error)}`)
      } else {
        logger.error(`OCR failed: ${formatErrorMessage(error)}`)
      }
      return false
    }
  }
}
