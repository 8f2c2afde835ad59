// ============================================================
// Bookstore API Tests — Error Types
// ============================================================

/** Thrown while resolving configuration: a setting that cannot be parsed or validated. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when an HTTP exchange never completes (DNS failure, refused
 * connection, timeout). HTTP error statuses are not transport errors.
 */
export class TransportError extends Error {
  constructor(
    readonly method: string,
    readonly url: string,
    options: { cause: unknown },
  ) {
    super(`${method} ${url} failed before a response was received: ${errorMessage(options.cause)}`, options);
    this.name = 'TransportError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
