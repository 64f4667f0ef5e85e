export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConnectionError'
  }
}

export class SpreadsheetNotFoundError extends Error {
  constructor(readonly spreadsheetName: string) {
    super(`Spreadsheet "${spreadsheetName}" not found`)
    this.name = 'SpreadsheetNotFoundError'
  }
}

// Rejected input to the pending-activity list
export class StagingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StagingError'
  }
}

export function errorMessage(e: unknown, fallback: string): string {
  return e instanceof Error && e.message ? e.message : fallback
}
