/**
 * Error types raised while building the index
 */

export class IndexGenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Transport failure, timeout or non-success status on a request
 */
export class NetworkError extends IndexGenerationError {
  public readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * Response body is not JSON or lacks the expected shape
 */
export class MalformedResponseError extends IndexGenerationError {}

/**
 * Mirroring a single artifact failed; the link is omitted
 */
export class DownloadError extends IndexGenerationError {
  public readonly url: string;
  public readonly destination: string;

  constructor(
    message: string,
    url: string,
    destination: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.url = url;
    this.destination = destination;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
