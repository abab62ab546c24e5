/**
 * Error taxonomy for provider calls, cache, storage and job state.
 * Provider- and cache-level errors are absorbed into fallback or cache-less
 * decisions; only exhaustion for a required artifact reaches the segment level.
 */

/** Retryable: timeouts, 429/5xx, connection resets. */
export class TransientProviderError extends Error {
  constructor(message: string, public readonly provider?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientProviderError';
  }
}

/** Non-retryable: bad credentials, invalid request, malformed response. */
export class PermanentProviderError extends Error {
  constructor(message: string, public readonly provider?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermanentProviderError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export interface ProviderAttempt {
  provider: string;
  outcome: 'skipped' | 'empty' | 'failed' | 'succeeded';
  reason?: string;
  calls: number;
  error?: unknown;
}

export class AllProvidersExhaustedError extends Error {
  constructor(public readonly requestType: string, public readonly attempts: ProviderAttempt[]) {
    const tried = attempts.map((a) => `${a.provider}:${a.outcome}`).join(', ') || 'none';
    super(`All providers exhausted for ${requestType} (${tried})`);
    this.name = 'AllProvidersExhaustedError';
  }
}

export class CacheBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheBackendError';
  }
}

export class ResourceExhaustionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceExhaustionError';
  }
}

export class StorageWriteFailure extends Error {
  constructor(public readonly table: string, message: string, options?: { cause?: unknown }) {
    super(`Write to ${table} failed: ${message}`, options);
    this.name = 'StorageWriteFailure';
  }
}

export class JobStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobStateError';
  }
}

// ── Classification ────────────────────────────────────────────────────────────

export type ErrorKind =
  | 'transient_provider'
  | 'permanent_provider'
  | 'retry_exhausted'
  | 'all_providers_exhausted'
  | 'cache_backend'
  | 'resource_exhaustion'
  | 'storage_write'
  | 'render'
  | 'unknown';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorKind(err: unknown): ErrorKind {
  if (err instanceof TransientProviderError)     return 'transient_provider';
  if (err instanceof PermanentProviderError)     return 'permanent_provider';
  if (err instanceof RetryExhaustedError)        return 'retry_exhausted';
  if (err instanceof AllProvidersExhaustedError) return 'all_providers_exhausted';
  if (err instanceof CacheBackendError)          return 'cache_backend';
  if (err instanceof ResourceExhaustionError)    return 'resource_exhaustion';
  if (err instanceof StorageWriteFailure)        return 'storage_write';
  return 'unknown';
}

const NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET'];

/** Connection-level failures that are worth another attempt. */
export function isConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
  if (NETWORK_CODES.includes(code)) return true;
  if (err.cause !== undefined && err.cause !== err && isConnectionError(err.cause)) return true;
  return (
    err.message.includes('fetch failed') ||
    err.message.includes('network timeout') ||
    NETWORK_CODES.some((c) => err.message.includes(c))
  );
}

export function isTransient(err: unknown): boolean {
  if (err instanceof TransientProviderError) return true;
  if (err instanceof PermanentProviderError) return false;
  return isConnectionError(err);
}

/** Kind and message for an error record, whatever was thrown. */
export function describeError(err: unknown): { kind: ErrorKind; message: string } {
  return { kind: errorKind(err), message: errorMessage(err) };
}
