/**
 * Error types shared across layers
 */

/**
 * Non-2xx answer from the remote service. `retryable` is true for 429 and 5xx.
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly retryable: boolean
  ) {
    super(`HTTP error! status: ${status}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Remote body that is not JSON or lacks the nested keys we read
 */
export class MalformedResponseError extends Error {
  constructor(operation: string, detail: string) {
    super(`Malformed ${operation} response: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super('Job not found');
    this.name = 'JobNotFoundError';
  }
}

export class JobNotReadyError extends Error {
  constructor(public readonly jobId: string, public readonly status: string) {
    super(`Job is not ready. Current status: ${status}`);
    this.name = 'JobNotReadyError';
  }
}

export class NothingToRetryError extends Error {
  constructor(public readonly jobId: string) {
    super('No failed accessions to retry');
    this.name = 'NothingToRetryError';
  }
}

export class InvalidFormatError extends Error {
  constructor(public readonly format: string) {
    super("Invalid format. Use 'json' or 'csv'.");
    this.name = 'InvalidFormatError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
