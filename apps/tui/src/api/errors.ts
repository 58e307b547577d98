import type { ZodError } from 'zod';

export { NotFoundError } from '@marketdesk/utils';

/**
 * The data service could not be reached: refused connection, DNS failure
 * or request timeout.
 */
export class ConnectionFailureError extends Error {
  constructor(
    public readonly url: string,
    options?: ErrorOptions
  ) {
    super(`Cannot reach data service at ${new URL(url).origin}`, options);
    this.name = 'ConnectionFailureError';
  }
}

/**
 * The data service answered with a non-2xx status.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    detail?: string
  ) {
    super(detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`);
    this.name = 'HttpError';
  }
}

/**
 * The body was not JSON or did not match the expected shape.
 */
export class ResponseShapeError extends Error {
  constructor(
    public readonly url: string,
    public readonly issues?: ZodError
  ) {
    super(`Unexpected response from ${new URL(url).pathname}`);
    this.name = 'ResponseShapeError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
