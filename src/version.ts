import { readFileSync } from 'node:fs'

const FALLBACK_VERSION = '0.0.0'

export function resolvePackageVersion(importMetaUrl: string = import.meta.url): string {
  try {
    const raw = readFileSync(new URL('../package.json', importMetaUrl), 'utf8')
    const parsed: unknown = JSON.parse(raw)
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      const version = parsed.version
      if (typeof version === 'string' && version.trim()) return version.trim()
    }
  } catch {
    // Not packaged next to a package.json.
  }
  return FALLBACK_VERSION
}

export function formatVersionLine(): string {
  return `lecture-chapters ${resolvePackageVersion()}`
}
