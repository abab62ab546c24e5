/**
 * Content-addressed artifact cache.
 *
 * Entries are immutable once written: a repeat put for a live key only bumps
 * usage stats. Expired entries stay in storage (invisible to lookup) until
 * evictExpired() runs. An entry whose metadata no longer parses reads as a
 * miss and is overwritten by the next put.
 */
import { CacheBackendError, RetryExhaustedError, errorMessage, isConnectionError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import {
  METADATA_SCHEMAS,
  type ArtifactKind,
  type CacheEntry,
  type CacheMetadataByKind,
  type CacheRepository,
  type CacheRow,
} from './types.js';

const log = createLogger('cache');

export interface CacheStoreOptions {
  ttlMs: number;
  /** Attempts per backend call when the connection drops. Defaults to 3. */
  backendAttempts?: number;
  backendRetryDelayMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export class CacheStore {
  private readonly now: () => Date;

  constructor(private readonly repo: CacheRepository, private readonly opts: CacheStoreOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  async lookup<K extends ArtifactKind>(kind: K, key: string): Promise<CacheEntry<K> | null> {
    const row = await this.backend(`lookup ${kind}`, () => this.repo.find(kind, key));
    if (!row) return null;
    const entry = readEntry(kind, row);
    if (!entry) return null;
    if (this.isExpired(entry)) {
      log.debug('Cache entry expired', { kind, key, expiresAt: row.expiresAt });
      return null;
    }
    return entry;
  }

  async put<K extends ArtifactKind>(
    kind: K,
    key: string,
    payloadRef: string,
    metadata: CacheMetadataByKind[K],
  ): Promise<CacheEntry<K>> {
    const existing = await this.backend(`put ${kind}`, () => this.repo.find(kind, key));
    const fresh = this.newRow(kind, key, payloadRef, metadata);

    if (existing) {
      const current = readEntry(kind, existing);
      if (current && !this.isExpired(current)) return this.touchExisting(kind, key, existing);
      log.info('Refreshing stale cache entry', { kind, key, corrupt: current === null });
      return toEntry(kind, await this.backend(`replace ${kind}`, () => this.repo.replace(fresh)));
    }

    const { row, inserted } = await this.backend(`insert ${kind}`, () => this.repo.insertIfAbsent(fresh));
    if (inserted) return toEntry(kind, row);
    // Another writer won the race for this key; its payload is equivalent by key construction.
    return this.touchExisting(kind, key, row);
  }

  /** Bumps usage stats. Works on expired entries too. */
  async touch<K extends ArtifactKind>(kind: K, key: string): Promise<CacheEntry<K> | null> {
    const row = await this.backend(`touch ${kind}`, () => this.repo.recordUse(kind, key, this.now().toISOString()));
    return row ? toEntry(kind, row) : null;
  }

  async evictExpired(): Promise<number> {
    const removed = await this.backend('evict', () => this.repo.deleteExpired(this.now().toISOString()));
    log.info('Cache eviction pass complete', { removed });
    return removed;
  }

  private async touchExisting<K extends ArtifactKind>(kind: K, key: string, fallback: CacheRow): Promise<CacheEntry<K>> {
    return (await this.touch(kind, key)) ?? toEntry(kind, fallback);
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now().getTime() > entry.expiresAt.getTime();
  }

  private newRow<K extends ArtifactKind>(kind: K, key: string, payloadRef: string, metadata: CacheMetadataByKind[K]): CacheRow {
    const now = this.now();
    return {
      kind,
      cacheKey: key,
      payloadRef,
      metadata,
      createdAt: now.toISOString(),
      lastUsedAt: now.toISOString(),
      useCount: 0,
      expiresAt: new Date(now.getTime() + this.opts.ttlMs).toISOString(),
    };
  }

  private async backend<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        maxAttempts: this.opts.backendAttempts ?? 3,
        baseDelayMs: this.opts.backendRetryDelayMs ?? 500,
        isRetryable: isConnectionError,
        sleep: this.opts.sleep,
        label: `cache ${op}`,
      });
    } catch (err) {
      if (err instanceof CacheBackendError) throw err;
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      throw new CacheBackendError(`Cache ${op} failed: ${errorMessage(cause)}`, { cause });
    }
  }
}

function readEntry<K extends ArtifactKind>(kind: K, row: CacheRow): CacheEntry<K> | null {
  try {
    return toEntry(kind, row);
  } catch (err) {
    log.warn('Corrupt cache entry — treating as miss', { kind, key: row.cacheKey, error: errorMessage(err) });
    return null;
  }
}

function toEntry<K extends ArtifactKind>(kind: K, row: CacheRow): CacheEntry<K> {
  const metadata = METADATA_SCHEMAS[kind].safeParse(row.metadata);
  if (!metadata.success) {
    throw new CacheBackendError(`Corrupt ${kind} cache entry ${row.cacheKey}: ${metadata.error.message}`);
  }
  return {
    kind,
    key: row.cacheKey,
    payloadRef: row.payloadRef,
    metadata: metadata.data,
    createdAt: new Date(row.createdAt),
    lastUsedAt: new Date(row.lastUsedAt),
    useCount: row.useCount,
    expiresAt: new Date(row.expiresAt),
  };
}
