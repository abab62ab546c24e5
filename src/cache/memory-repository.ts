import type { ArtifactKind, CacheRepository, CacheRow } from './types.js';

/** In-process cache repository, used when no store is configured. */
export class MemoryCacheRepository implements CacheRepository {
  private readonly rows = new Map<string, CacheRow>();

  async find(kind: ArtifactKind, key: string): Promise<CacheRow | null> {
    const row = this.rows.get(slot(kind, key));
    return row ? { ...row } : null;
  }

  async insertIfAbsent(row: CacheRow): Promise<{ row: CacheRow; inserted: boolean }> {
    const existing = this.rows.get(slot(row.kind, row.cacheKey));
    if (existing) return { row: { ...existing }, inserted: false };
    this.rows.set(slot(row.kind, row.cacheKey), { ...row });
    return { row: { ...row }, inserted: true };
  }

  async replace(row: CacheRow): Promise<CacheRow> {
    this.rows.set(slot(row.kind, row.cacheKey), { ...row });
    return { ...row };
  }

  async recordUse(kind: ArtifactKind, key: string, usedAt: string): Promise<CacheRow | null> {
    const row = this.rows.get(slot(kind, key));
    if (!row) return null;
    row.useCount += 1;
    row.lastUsedAt = usedAt;
    return { ...row };
  }

  async deleteExpired(now: string): Promise<number> {
    const cutoff = new Date(now).getTime();
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (new Date(row.expiresAt).getTime() < cutoff) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.rows.size;
  }

  keys(kind?: ArtifactKind): string[] {
    return [...this.rows.values()].filter((r) => !kind || r.kind === kind).map((r) => r.cacheKey);
  }
}

const slot = (kind: ArtifactKind, key: string) => `${kind}:${key}`;
