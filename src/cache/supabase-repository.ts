import { z } from 'zod';
import type { SupabaseClient } from '@supabase/supabase-js';
import { ARTIFACT_KINDS, type ArtifactKind, type CacheRepository, type CacheRow } from './types.js';

const TABLE = 'artifact_cache';

const RowSchema = z
  .object({
    kind:         z.enum(ARTIFACT_KINDS),
    cache_key:    z.string(),
    payload_ref:  z.string(),
    metadata:     z.unknown(),
    created_at:   z.string(),
    last_used_at: z.string(),
    use_count:    z.number().int(),
    expires_at:   z.string(),
  })
  .transform((r): CacheRow => ({
    kind:       r.kind,
    cacheKey:   r.cache_key,
    payloadRef: r.payload_ref,
    metadata:   r.metadata,
    createdAt:  r.created_at,
    lastUsedAt: r.last_used_at,
    useCount:   r.use_count,
    expiresAt:  r.expires_at,
  }));

function toRecord(row: CacheRow) {
  return {
    kind:         row.kind,
    cache_key:    row.cacheKey,
    payload_ref:  row.payloadRef,
    metadata:     row.metadata,
    created_at:   row.createdAt,
    last_used_at: row.lastUsedAt,
    use_count:    row.useCount,
    expires_at:   row.expiresAt,
  };
}

/**
 * artifact_cache table. Uniqueness of (kind, cache_key) is enforced by the
 * database; use-count bumps go through the touch_artifact() function so
 * concurrent hits never lose an increment.
 */
export class SupabaseCacheRepository implements CacheRepository {
  constructor(private readonly db: SupabaseClient) {}

  async find(kind: ArtifactKind, key: string): Promise<CacheRow | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('kind', kind)
      .eq('cache_key', key)
      .maybeSingle();
    if (error) throw new Error(error.message);
    return data ? RowSchema.parse(data) : null;
  }

  async insertIfAbsent(row: CacheRow): Promise<{ row: CacheRow; inserted: boolean }> {
    const { data, error } = await this.db
      .from(TABLE)
      .upsert(toRecord(row), { onConflict: 'kind,cache_key', ignoreDuplicates: true })
      .select();
    if (error) throw new Error(error.message);
    const [created] = z.array(RowSchema).parse(data ?? []);
    if (created) return { row: created, inserted: true };

    const stored = await this.find(row.kind, row.cacheKey);
    if (!stored) throw new Error(`Conflicting ${row.kind} entry ${row.cacheKey} vanished after insert`);
    return { row: stored, inserted: false };
  }

  async replace(row: CacheRow): Promise<CacheRow> {
    const { data, error } = await this.db
      .from(TABLE)
      .upsert(toRecord(row), { onConflict: 'kind,cache_key' })
      .select()
      .single();
    if (error) throw new Error(error.message);
    return RowSchema.parse(data);
  }

  async recordUse(kind: ArtifactKind, key: string, usedAt: string): Promise<CacheRow | null> {
    const { data, error } = await this.db.rpc('touch_artifact', {
      p_kind: kind,
      p_cache_key: key,
      p_used_at: usedAt,
    });
    if (error) throw new Error(error.message);
    const [row] = z.array(RowSchema).parse(data ?? []);
    return row ?? null;
  }

  async deleteExpired(now: string): Promise<number> {
    const { count, error } = await this.db
      .from(TABLE)
      .delete({ count: 'exact' })
      .lt('expires_at', now);
    if (error) throw new Error(error.message);
    return count ?? 0;
  }
}
