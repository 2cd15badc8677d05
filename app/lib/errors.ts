/**
 * errors.ts
 *
 * Error types that cross module boundaries. Everything else throws plain
 * `Error`s.
 */

export interface CatalogErrorDetails {
  status: number; // 0 when the request never reached the server
  endpoint: string;
  retryAfter?: number; // seconds, from the Retry-After header
  body?: string;
}

/**
 * A failed call to the catalog service: network error, non-2xx status or a
 * response body that does not match the expected shape.
 */
export class CatalogRequestError extends Error {
  readonly status: number;
  readonly endpoint: string;
  readonly retryAfter?: number;
  readonly body?: string;

  constructor(message: string, details: CatalogErrorDetails) {
    super(message);
    this.name = "CatalogRequestError";
    this.status = details.status;
    this.endpoint = details.endpoint;
    this.retryAfter = details.retryAfter;
    this.body = details.body;
  }

  get retryable(): boolean {
    return this.status === 0 || this.status === 429 || this.status >= 500;
  }
}

export class PlaylistValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid playlist: ${issues.join("; ")}`);
    this.name = "PlaylistValidationError";
    this.issues = issues;
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
