// ============================================================================
// chatdeck - Error Types
// ============================================================================

/**
 * A required external program is not on PATH
 */
export class DependencyMissingError extends Error {
  constructor(
    public readonly binary: string,
    public readonly installHints: string[]
  ) {
    super(`'${binary}' not found on PATH`);
    this.name = 'DependencyMissingError';
  }
}

/**
 * A summarization request failed (network, HTTP status or response shape)
 */
export class SummaryRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SummaryRequestError';
  }
}

/**
 * A line returned by the finder does not carry a row index
 */
export class InvalidSelectionError extends Error {
  constructor(public readonly line: string) {
    super(`Selection has no row index: '${line}'`);
    this.name = 'InvalidSelectionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
