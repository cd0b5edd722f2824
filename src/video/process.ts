import type { ChildProcess } from 'node:child_process'
import { spawn } from 'node:child_process'
import { accessSync, constants as fsConstants } from 'node:fs'
import path from 'node:path'

const STDERR_LIMIT = 8192

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  if (!binary) return null
  if (path.isAbsolute(binary) || binary.includes(path.sep)) {
    return isExecutable(binary) ? binary : null
  }
  const pathEnv = env.PATH ?? ''
  for (const entry of pathEnv.split(path.delimiter)) {
    if (!entry) continue
    const candidate = path.join(entry, binary)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

/** Env override first, then a configured path, then PATH. */
export function resolveToolPath({
  binary,
  env,
  envKey,
  configured,
}: {
  binary: string
  env: Record<string, string | undefined>
  envKey: string
  configured?: string | null
}): string | null {
  const explicit = env[envKey]?.trim()
  if (explicit) return resolveExecutableInPath(explicit, env)
  if (configured) return resolveExecutableInPath(configured, env)
  return resolveExecutableInPath(binary, env)
}

export function appendStderr(current: string, chunk: string): string {
  if (current.length >= STDERR_LIMIT) return current
  return current + chunk
}

/** Resolves once the process has exited (or failed to spawn). */
export function waitForExit(proc: ChildProcess): Promise<number | null> {
  return new Promise((resolve) => {
    proc.once('close', (code: number | null) => resolve(code))
    proc.once('error', () => resolve(proc.exitCode))
  })
}

export function isRunning(proc: ChildProcess): boolean {
  return proc.exitCode === null && proc.signalCode === null
}

export async function runProcessCapture({
  command,
  args,
  timeoutMs,
  errorLabel,
  signal,
}: {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
  signal?: AbortSignal
}): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], signal })
    let stdout = ''
    let stderr = ''

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      reject(new Error(`${errorLabel} timed out`))
    }, timeoutMs)

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
      reject(error)
    })

    proc.on('close', (code) => {
      clearTimeout(timeout)
      if (code === 0) {
        resolve(stdout)
        return
      }
      const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
      reject(new Error(`${errorLabel} exited with code ${code}${suffix}`))
    })
  })
}
