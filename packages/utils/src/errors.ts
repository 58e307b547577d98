/**
 * Raised when a catalog lookup misses. Carries the HTTP status the data
 * service answers with.
 */
export class NotFoundError extends Error {
  readonly status = 404;

  constructor(
    public readonly resource: 'Stock' | 'Startup',
    public readonly key: string
  ) {
    super(`${resource} not found`);
    this.name = 'NotFoundError';
  }
}
