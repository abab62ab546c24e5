/**
 * Provider health — append-only call history and a rolling success ratio.
 * Purely an input signal: nothing here ever blocks a call.
 */
import { z } from 'zod';
import type { SupabaseClient } from '@supabase/supabase-js';
import { createLogger } from '../utils/logger.js';
import { errorMessage, isConnectionError } from '../errors.js';
import { withRetry } from '../utils/retry.js';

const log = createLogger('health');

export interface ProviderCallRecord {
  provider: string;
  requestSignature: string;
  succeeded: boolean;
  latencyMs: number;
  errorDetail: string | null;
  timestamp: Date;
}

/** Durable destination for call records. */
export interface CallRecordSink {
  append(record: ProviderCallRecord): Promise<void>;
  since(from: Date): Promise<ProviderCallRecord[]>;
}

export interface HealthTrackerOptions {
  windowMs: number;
  neutralScore: number;
  /** Records older than this are dropped from memory. Defaults to the window. */
  retentionMs?: number;
  sink?: CallRecordSink;
  /** Attempts per sink write when the connection drops. Defaults to 3. */
  sinkAttempts?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export class ProviderHealthTracker {
  private readonly records = new Map<string, ProviderCallRecord[]>();
  private readonly now: () => Date;
  private readonly retentionMs: number;

  constructor(private readonly opts: HealthTrackerOptions) {
    this.now = opts.now ?? (() => new Date());
    this.retentionMs = opts.retentionMs ?? opts.windowMs;
  }

  record(
    provider: string,
    outcome: { succeeded: boolean; latencyMs: number; requestSignature?: string; error?: unknown },
  ): ProviderCallRecord {
    const rec: ProviderCallRecord = Object.freeze({
      provider,
      requestSignature: outcome.requestSignature ?? '',
      succeeded: outcome.succeeded,
      latencyMs: Math.max(0, Math.round(outcome.latencyMs)),
      errorDetail: outcome.error === undefined ? null : errorMessage(outcome.error),
      timestamp: this.now(),
    });
    this.append(rec);

    const sink = this.opts.sink;
    if (sink) {
      // Best-effort: health tracking must never fail the call it describes
      withRetry(() => sink.append(rec), {
        maxAttempts: this.opts.sinkAttempts ?? 3,
        baseDelayMs: 500,
        isRetryable: isConnectionError,
        sleep: this.opts.sleep,
        label: 'api_tracking write',
      }).catch((err: unknown) =>
        log.warn('Could not persist call record', { provider, error: errorMessage(err) }));
    }
    return rec;
  }

  healthScore(provider: string, windowMs = this.opts.windowMs): number {
    const from = this.now().getTime() - windowMs;
    const inWindow = (this.records.get(provider) ?? []).filter((r) => r.timestamp.getTime() >= from);
    if (inWindow.length === 0) return this.opts.neutralScore;
    return inWindow.filter((r) => r.succeeded).length / inWindow.length;
  }

  snapshot(providers: readonly string[], windowMs = this.opts.windowMs): Record<string, number> {
    return Object.fromEntries(providers.map((p) => [p, this.healthScore(p, windowMs)]));
  }

  callsFor(provider: string): readonly ProviderCallRecord[] {
    return this.records.get(provider) ?? [];
  }

  /** Load the trailing window from the sink so scores survive a restart. */
  async hydrate(): Promise<number> {
    if (!this.opts.sink) return 0;
    const from = new Date(this.now().getTime() - this.retentionMs);
    const loaded = await this.opts.sink.since(from);
    for (const rec of loaded) this.append(rec);
    log.info('Hydrated provider call history', { records: loaded.length });
    return loaded.length;
  }

  private append(rec: ProviderCallRecord): void {
    const cutoff = this.now().getTime() - this.retentionMs;
    const list = (this.records.get(rec.provider) ?? []).filter((r) => r.timestamp.getTime() >= cutoff);
    list.push(rec);
    list.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    this.records.set(rec.provider, list);
  }
}

// ── api_tracking sink ─────────────────────────────────────────────────────────

const TrackingRowSchema = z.object({
  provider:          z.string(),
  request_signature: z.string().nullable(),
  succeeded:         z.boolean(),
  latency_ms:        z.number(),
  error_detail:      z.string().nullable(),
  created_at:        z.string(),
});

export class SupabaseCallRecordSink implements CallRecordSink {
  constructor(private readonly db: SupabaseClient) {}

  async append(record: ProviderCallRecord): Promise<void> {
    const { error } = await this.db.from('api_tracking').insert({
      provider:          record.provider,
      request_signature: record.requestSignature,
      succeeded:         record.succeeded,
      latency_ms:        record.latencyMs,
      error_detail:      record.errorDetail,
      created_at:        record.timestamp.toISOString(),
    });
    if (error) throw new Error(error.message);
  }

  async since(from: Date): Promise<ProviderCallRecord[]> {
    const { data, error } = await this.db
      .from('api_tracking')
      .select('provider, request_signature, succeeded, latency_ms, error_detail, created_at')
      .gte('created_at', from.toISOString())
      .order('created_at', { ascending: true });
    if (error) throw new Error(error.message);
    return z.array(TrackingRowSchema).parse(data ?? []).map((r) => ({
      provider:         r.provider,
      requestSignature: r.request_signature ?? '',
      succeeded:        r.succeeded,
      latencyMs:        r.latency_ms,
      errorDetail:      r.error_detail,
      timestamp:        new Date(r.created_at),
    }));
  }
}
