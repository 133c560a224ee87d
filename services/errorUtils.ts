/**
 * Error types raised by the dashboard services, plus a helper to turn any
 * thrown value into a message for the UI.
 */

export class DatasetLoadError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'DatasetLoadError';
    this.status = status;
  }
}

export class DatasetFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetFormatError';
  }
}

/**
 * Raised when the statistics bundle has no table for a direction/metric pair.
 * The builder and the selectors disagree: a programming error, not user input.
 */
export class StatisticsLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StatisticsLookupError';
  }
}

/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
