/**
 * Login rejected, errored, or timed out. Fatal for the connection attempt.
 */
export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthenticationError";
  }
}

/**
 * OKX REST answered with a non-zero `code`, or the request itself failed.
 */
export class ExchangeRequestError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly code?: string
  ) {
    super(message);
    this.name = "ExchangeRequestError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
