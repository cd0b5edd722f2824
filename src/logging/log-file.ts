import fs from 'node:fs/promises'
import path from 'node:path'

export type LogFileWriter = {
  filePath: string
  write: (line: string) => void
  /** Resolves once every queued line is on disk; rejects with the first write error. */
  flush: () => Promise<void>
}

/** Appends lines in order without blocking the caller. */
export function createLogFileWriter(filePath: string): LogFileWriter {
  const ensureDir = fs.mkdir(path.dirname(filePath), { recursive: true })
  let chain: Promise<void> = Promise.resolve()
  let failure: unknown = null

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    chain = chain
      .then(async () => {
        await ensureDir
        await fs.appendFile(filePath, normalized, 'utf8')
      })
      .catch((error: unknown) => {
        failure ??= error
      })
  }

  const flush = async () => {
    await chain
    if (failure) throw failure
  }

  return { filePath, write, flush }
}
