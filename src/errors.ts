export enum ErrorCode {
  // Connection errors
  CONNECTION_FAILED = "CONNECTION_FAILED",
  CONNECTION_CLOSED = "CONNECTION_CLOSED",
  READ_TIMEOUT = "READ_TIMEOUT",
  AUTH_FAILED = "AUTH_FAILED",

  // Measurement errors
  SAMPLE_COUNT_MISMATCH = "SAMPLE_COUNT_MISMATCH",

  // Setup errors
  INVALID_CONFIG = "INVALID_CONFIG",
  RESULTS_NOT_FOUND = "RESULTS_NOT_FOUND",
}

export class BenchmarkError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string,
  ) {
    super(message || code);
    this.name = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
