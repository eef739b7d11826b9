// Errors.ts
// =========
// Error types shared by the conversation pipeline, storage and vendors.

// Signals that a model backend throttled the request. Vendors throw this in
// place of their SDK's own 429 error so the backoff policy can recognize it.
export class RateLimitError extends Error {
  readonly vendor: string;

  constructor(vendor: string, message: string, options?: { cause?: unknown }) {
    super(`${vendor}: ${message}`, options);
    this.name = 'RateLimitError';
    this.vendor = vendor;
  }
}

// Raised once the backoff policy gives up on a throttled call.
export class RateLimitExceeded extends Error {
  readonly attempts: number;
  readonly elapsedMs: number;

  constructor(attempts: number, elapsedMs: number, cause: unknown) {
    super(`Rate limit persisted after ${attempts} attempts (${Math.round(elapsedMs)} ms)`, { cause });
    this.name = 'RateLimitExceeded';
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
  }
}

// A storage key that would resolve outside the storage root.
export class PathEscapeError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`File name ${key} attempted to access a parent path.`);
    this.name = 'PathEscapeError';
    this.key = key;
  }
}

export class MissingTemplateError extends Error {
  constructor(name: string, dir: string) {
    super(`Prompt template "${name}" not found in ${dir}`);
    this.name = 'MissingTemplateError';
  }
}

// Converts unknown errors to readable strings
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Throws a formatted fatal error
export function fail(message: string): never {
  throw new Error(message);
}

// Reads the HTTP status an SDK error carries, if any
export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  var status = error.status;
  return typeof status === 'number' ? status : undefined;
}

// Rethrows an SDK error, turning HTTP 429 into a RateLimitError
export function rethrowVendorError(vendor: string, error: unknown): never {
  if (errorStatus(error) === 429) {
    throw new RateLimitError(vendor, errorMessage(error), { cause: error });
  }
  throw error;
}
