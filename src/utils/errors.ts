/**
 * Error types raised by proxy components. Setup-time problems are
 * ConfigurationErrors; request-time failures are converted to an HTTP
 * status by the proxy engine and never escape it.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidUrlError extends ConfigurationError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Invalid server URL "${url}": ${reason}`);
    this.name = 'InvalidUrlError';
    this.url = url;
  }
}

export class InvalidPatternError extends ConfigurationError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid route pattern "${pattern}": ${reason}`);
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }
}

export class CircuitOpenError extends Error {
  readonly circuitName: string;

  constructor(circuitName: string) {
    super(`Circuit breaker is open for ${circuitName}`);
    this.name = 'CircuitOpenError';
    this.circuitName = circuitName;
  }
}

export class UnauthorizedError extends Error {
  readonly status = 401;

  constructor(message = 'unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends Error {
  readonly status = 403;

  constructor(message = 'forbidden') {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
