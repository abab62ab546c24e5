/**
 * Database client — Supabase primary, SQLite local fallback.
 *
 * Writes are retried on connection errors; if Supabase stays unreachable the
 * write is queued in SQLite and replayed by syncPendingToSupabase() once a
 * later write succeeds. With no Supabase configured at all, callers use the
 * in-process repositories instead of this module.
 */
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { RetryExhaustedError, StorageWriteFailure, errorMessage, isConnectionError } from '../errors.js';
import { telegram } from '../monitoring/telegram.js';

export type DbRow = Record<string, unknown>;

// ─── Supabase singleton ───────────────────────────────────────────────────────

let _supabase: SupabaseClient | null = null;
let supabaseDown = false;

export function isStoreConfigured(): boolean {
  return Boolean(env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY);
}

export function getSupabase(): SupabaseClient {
  if (!_supabase) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) {
      throw new Error('Supabase is not configured (SUPABASE_URL / SUPABASE_SERVICE_KEY)');
    }
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false },
    });
  }
  return _supabase;
}

// ─── Write path ───────────────────────────────────────────────────────────────

async function writeWithRetry(table: string, fn: () => Promise<DbRow>): Promise<DbRow> {
  return withRetry(fn, {
    maxAttempts: env.STORE_WRITE_ATTEMPTS,
    baseDelayMs: 500,
    isRetryable: isConnectionError,
    label: `db write ${table}`,
  });
}

function unreachable(err: unknown): boolean {
  return err instanceof RetryExhaustedError ? isConnectionError(err.lastError) : isConnectionError(err);
}

async function markRecovered(): Promise<void> {
  if (!supabaseDown) return;
  supabaseDown = false;
  logger.info('Supabase reachable again — replaying queued writes');
  await syncPendingToSupabase().catch((err: unknown) =>
    logger.warn('Replay of queued writes failed', { error: errorMessage(err) }));
}

async function markDown(note: string): Promise<void> {
  if (supabaseDown) return;
  supabaseDown = true;
  await telegram.alert(`Supabase unreachable — ${note}`);
}

export async function dbInsert(table: string, data: DbRow): Promise<DbRow> {
  try {
    const result = await writeWithRetry(table, async () => {
      const { data: row, error } = await getSupabase().from(table).insert(data).select().single();
      if (error) throw new Error(error.message);
      return toRow(row);
    });
    await markRecovered();
    return result;
  } catch (err) {
    if (unreachable(err)) {
      await markDown('queuing writes in SQLite.');
      return localWrite(table, 'insert', null, data);
    }
    throw new StorageWriteFailure(table, errorMessage(err), { cause: err });
  }
}

export async function dbUpdate(table: string, id: string, data: DbRow): Promise<DbRow> {
  const payload = { ...data, updated_at: new Date().toISOString() };
  try {
    const result = await writeWithRetry(table, async () => {
      const { data: row, error } = await getSupabase().from(table).update(payload).eq('id', id).select().single();
      if (error) throw new Error(error.message);
      return toRow(row);
    });
    await markRecovered();
    return result;
  } catch (err) {
    if (unreachable(err)) {
      await markDown('queuing updates in SQLite.');
      return localWrite(table, 'update', id, payload);
    }
    throw new StorageWriteFailure(table, errorMessage(err), { cause: err });
  }
}

// ─── Read path ────────────────────────────────────────────────────────────────

export async function dbSelect(table: string, filters: DbRow = {}): Promise<DbRow[]> {
  let q = getSupabase().from(table).select('*');
  for (const [k, v] of Object.entries(filters)) q = q.eq(k, v);
  const { data, error } = await q;
  if (error) throw new Error(error.message);
  return (data ?? []).map(toRow);
}

export function toRow(value: unknown): DbRow {
  if (typeof value !== 'object' || value === null) throw new Error('Unexpected non-object row from Supabase');
  return Object.fromEntries(Object.entries(value));
}

// ─── SQLite fallback ──────────────────────────────────────────────────────────

let _localDb: import('better-sqlite3').Database | null = null;

async function getLocalDb(): Promise<import('better-sqlite3').Database> {
  if (!_localDb) {
    const { default: Database } = await import('better-sqlite3');
    mkdirSync(dirname(env.FALLBACK_DB_PATH), { recursive: true });
    _localDb = new Database(env.FALLBACK_DB_PATH);
    _localDb.exec(`
      CREATE TABLE IF NOT EXISTS pending_sync (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        table_name  TEXT    NOT NULL,
        operation   TEXT    NOT NULL,
        record_id   TEXT,
        record_data TEXT    NOT NULL,
        created_at  TEXT    NOT NULL DEFAULT (datetime('now'))
      )
    `);
  }
  return _localDb;
}

async function localWrite(table: string, operation: 'insert' | 'update', id: string | null, data: DbRow): Promise<DbRow> {
  logger.warn(`Writing ${operation.toUpperCase()} to SQLite fallback`, { table, id });
  try {
    const db = await getLocalDb();
    db.prepare('INSERT INTO pending_sync (table_name, operation, record_id, record_data) VALUES (?, ?, ?, ?)')
      .run(table, operation, id, JSON.stringify(data));
  } catch (err) {
    throw new StorageWriteFailure(table, `Supabase down and SQLite fallback failed: ${errorMessage(err)}`, { cause: err });
  }
  return { ...(id ? { id } : {}), ...data, _fallback: true };
}

interface PendingRow {
  id: number;
  table_name: string;
  operation: string;
  record_id: string | null;
  record_data: string;
}

export async function pendingSyncCount(): Promise<number> {
  const db = await getLocalDb();
  const row = db.prepare('SELECT COUNT(*) AS cnt FROM pending_sync').get();
  return typeof row === 'object' && row !== null && 'cnt' in row && typeof row.cnt === 'number' ? row.cnt : 0;
}

export async function syncPendingToSupabase(): Promise<number> {
  const db = await getLocalDb();
  const pending = db.prepare<[], PendingRow>('SELECT * FROM pending_sync ORDER BY id ASC').all();
  if (!pending.length) return 0;

  logger.info(`Syncing ${pending.length} local SQLite record(s) to Supabase`);
  let synced = 0;

  for (const row of pending) {
    try {
      const payload: unknown = JSON.parse(row.record_data);
      const record = toRow(payload);
      if (row.operation === 'insert') {
        const { error } = await getSupabase().from(row.table_name).upsert(record);
        if (error) throw new Error(error.message);
      } else if (row.operation === 'update' && row.record_id) {
        const { error } = await getSupabase().from(row.table_name).update(record).eq('id', row.record_id);
        if (error) throw new Error(error.message);
      }
      db.prepare('DELETE FROM pending_sync WHERE id = ?').run(row.id);
      synced++;
    } catch (err) {
      // Left in the queue for the next recovery cycle
      logger.warn('Sync retry failed — will retry on next recovery', {
        id: row.id,
        table: row.table_name,
        error: errorMessage(err),
      });
    }
  }

  const remaining = pending.length - synced;
  if (remaining === 0) logger.info('SQLite sync queue fully drained — Supabase is current');
  else logger.warn(`${remaining} record(s) still pending sync`);
  return synced;
}
