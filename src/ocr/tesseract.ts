import { spawn } from 'node:child_process'

import { appendStderr } from '../video/process.js'
import type { NormalizedImage, TextRecognizer } from './types.js'

const TESSERACT_TIMEOUT_MS = 120_000

export type TesseractOptions = {
  tesseractPath: string
  language: string
  pageSegmentationMode: number
  timeoutMs?: number
}

export function buildTesseractArgs({
  language,
  pageSegmentationMode,
}: Pick<TesseractOptions, 'language' | 'pageSegmentationMode'>): string[] {
  return ['stdin', 'stdout', '-l', language, '--oem', '3', '--psm', String(pageSegmentationMode)]
}

/**
 * Runs tesseract on one image piped through stdin and returns the raw text.
 * Once the process has started, the promise settles only after it exits.
 */
export async function runTesseract(
  image: NormalizedImage,
  options: TesseractOptions,
  signal?: AbortSignal
): Promise<string> {
  return new Promise((resolve, reject) => {
    const args = buildTesseractArgs(options)
    const proc = spawn(options.tesseractPath, args, { stdio: ['pipe', 'pipe', 'pipe'], signal })
    let stdout = ''
    let stderr = ''
    let failure: Error | null = null

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      reject(new Error('tesseract timed out'))
    }, options.timeoutMs ?? TESSERACT_TIMEOUT_MS)

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderr = appendStderr(stderr, chunk)
      })
    }

    proc.on('error', (error) => {
      clearTimeout(timeout)
      if (proc.pid === undefined) {
        reject(error)
        return
      }
      failure ??= error
    })

    proc.on('close', (code) => {
      clearTimeout(timeout)
      if (failure) {
        reject(failure)
        return
      }
      if (code === 0) {
        resolve(stdout)
        return
      }
      const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
      reject(new Error(`tesseract exited with code ${code}${suffix}`))
    })

    if (proc.stdin) {
      // EPIPE here means tesseract already quit; 'close' reports the exit code.
      proc.stdin.on('error', (error) => {
        stderr = appendStderr(stderr, `${error.message}\n`)
      })
      proc.stdin.end(image.png)
    }
  })
}

export function createTesseractRecognizer(options: TesseractOptions): TextRecognizer {
  return (image, signal) => runTesseract(image, options, signal)
}
