import { logger } from './logger.js';
import { RetryExhaustedError, TransientProviderError, isTransient } from '../errors.js';

export interface AttemptOutcome {
  attempt: number;
  succeeded: boolean;
  latencyMs: number;
  error?: unknown;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  /** Per-attempt budget; the attempt's signal aborts and the attempt counts as transient. */
  attemptTimeoutMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** Awaited before the retry decision, so it can update state the decision reads. */
  onAttempt?: (outcome: AttemptOutcome) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

export function backoffDelay(attempt: number, opts: Pick<RetryOptions, 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs' | 'jitter'>): number {
  const { baseDelayMs = 1_000, backoffFactor = 2, maxDelayMs = Number.POSITIVE_INFINITY, jitter = false } = opts;
  const raw = Math.min(baseDelayMs * Math.pow(backoffFactor, attempt - 1), maxDelayMs);
  return jitter ? Math.round(raw * (0.5 + Math.random() / 2)) : raw;
}

/** Run one attempt with its own abort signal, rejecting if it outlives `timeoutMs`. */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  label = 'operation',
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) return fn(controller.signal);
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientProviderError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounded exponential backoff. Non-retryable errors are rethrown as-is after
 * the attempt that raised them; running out of attempts throws
 * RetryExhaustedError so callers can tell "provider down" from "bad request".
 */
export async function withRetry<T>(fn: (signal: AbortSignal) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, isRetryable = isTransient, onRetry, onAttempt, sleep = defaultSleep, label = 'operation' } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const start = Date.now();
    try {
      const result = await withTimeout(fn, opts.attemptTimeoutMs, label);
      await onAttempt?.({ attempt, succeeded: true, latencyMs: Date.now() - start });
      return result;
    } catch (err) {
      await onAttempt?.({ attempt, succeeded: false, latencyMs: Date.now() - start, error: err });
      lastErr = err;
      if (!isRetryable(err)) throw err;
      if (attempt === maxAttempts) break;
      const delay = backoffDelay(attempt, opts);
      logger.warn(`Retry ${attempt}/${maxAttempts} in ${delay}ms`, { label, error: String(err) });
      onRetry?.(attempt, err, delay);
      await sleep(delay);
    }
  }
  throw new RetryExhaustedError(maxAttempts, lastErr);
}

/** A reusable retry configuration, bound once per provider. */
export class RetryPolicy {
  constructor(private readonly opts: RetryOptions) {}

  get maxAttempts(): number {
    return this.opts.maxAttempts;
  }

  execute<T>(fn: (signal: AbortSignal) => Promise<T>, extra: Partial<RetryOptions> = {}): Promise<T> {
    return withRetry(fn, { ...this.opts, ...extra });
  }
}
