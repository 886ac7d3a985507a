export type FeedErrorKind = "not_found" | "unsupported" | "transient" | "config";

export abstract class FeedError extends Error {
  abstract readonly kind: FeedErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends FeedError {
  readonly kind = "not_found";
}

export class UnsupportedError extends FeedError {
  readonly kind = "unsupported";
}

export class ConfigError extends FeedError {
  readonly kind = "config";
}

export interface TransientDetails {
  status?: number;
  code?: string;
  cause?: unknown;
}

export class TransientError extends FeedError {
  readonly kind = "transient";
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, details: TransientDetails = {}) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.code = details.code;
  }
}

// ── Upstream classification ─────────────────────────────────────

export interface UpstreamResponse {
  status: number;
  statusText?: string;
  code?: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Maps an upstream failure to NotFound (404) or Transient. */
export function classify(err: unknown, response?: UpstreamResponse): NotFoundError | TransientError {
  if (response?.status === 404) {
    return new NotFoundError(errorMessage(err), { cause: err });
  }
  if (!response) {
    return new TransientError(errorMessage(err), { cause: err });
  }
  const label = response.statusText ? `${response.status} ${response.statusText}` : `${response.status}`;
  return new TransientError(`${errorMessage(err)} (error ${label})`, {
    status: response.status,
    code: response.code,
    cause: err,
  });
}

/** Re-wraps an error with call context, keeping its kind. */
export function withContext(err: unknown, context: string): FeedError {
  const message = `${context}: ${errorMessage(err)}`;
  if (err instanceof NotFoundError) return new NotFoundError(message, { cause: err });
  if (err instanceof UnsupportedError) return new UnsupportedError(message, { cause: err });
  if (err instanceof ConfigError) return new ConfigError(message, { cause: err });
  if (err instanceof TransientError) {
    return new TransientError(message, { status: err.status, code: err.code, cause: err });
  }
  return new TransientError(message, { cause: err });
}
