export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class ScheduleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ScheduleError'
  }
}

/** Raised when the user interrupts a running boundary search. */
export class SearchAbortedError extends Error {
  constructor(message = 'Search aborted by user') {
    super(message)
    this.name = 'SearchAbortedError'
  }
}

export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
