/** Wrong or missing setup: scoring file, identifier column, folder. Aborts the run. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Not enough overlap between waves to compare them. Skips the analysis for one wave pair. */
export class PartialDataError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PartialDataError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
