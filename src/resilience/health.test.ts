import { describe, expect, it, vi } from 'vitest';
import { ProviderHealthTracker, type CallRecordSink, type ProviderCallRecord } from './health.js';

const MINUTE = 60_000;

function tracker(clock: { t: number }, sink?: CallRecordSink) {
  return new ProviderHealthTracker({ windowMs: 60 * MINUTE, neutralScore: 0.5, sink, now: () => new Date(clock.t) });
}

describe('ProviderHealthTracker', () => {
  it('scores an untested provider as neutral', () => {
    const t = tracker({ t: 0 });
    expect(t.healthScore('unsplash')).toBe(0.5);
  });

  it('scores successes over calls within the window', () => {
    const clock = { t: Date.parse('2026-03-01T00:00:00Z') };
    const t = tracker(clock);

    t.record('pexels', { succeeded: true, latencyMs: 120 });
    t.record('pexels', { succeeded: false, latencyMs: 900, error: new Error('503') });
    t.record('pexels', { succeeded: true, latencyMs: 110 });
    t.record('pexels', { succeeded: true, latencyMs: 95 });

    expect(t.healthScore('pexels')).toBe(0.75);
  });

  it('drops calls that slide out of the trailing window', () => {
    const clock = { t: Date.parse('2026-03-01T00:00:00Z') };
    const t = tracker(clock);

    t.record('nasa', { succeeded: false, latencyMs: 10 });
    clock.t += 30 * MINUTE;
    t.record('nasa', { succeeded: true, latencyMs: 10 });

    expect(t.healthScore('nasa')).toBe(0.5);
    expect(t.healthScore('nasa', 10 * MINUTE)).toBe(1);

    clock.t += 45 * MINUTE;
    expect(t.healthScore('nasa')).toBe(1);

    clock.t += 31 * MINUTE;
    expect(t.healthScore('nasa')).toBe(0.5);
    expect(t.callsFor('nasa')).toHaveLength(2);
  });

  it('records the error detail and an immutable record', () => {
    const t = tracker({ t: 0 });

    const rec = t.record('giphy', { succeeded: false, latencyMs: 12.6, requestSignature: 'media_video:moon', error: new Error('timeout') });

    expect(rec).toMatchObject({ provider: 'giphy', requestSignature: 'media_video:moon', latencyMs: 13, errorDetail: 'timeout' });
    expect(Object.isFrozen(rec)).toBe(true);
  });

  it('snapshots several providers at once', () => {
    const t = tracker({ t: 0 });
    t.record('nasa', { succeeded: false, latencyMs: 1 });

    expect(t.snapshot(['nasa', 'pixabay'])).toEqual({ nasa: 0, pixabay: 0.5 });
  });

  it('persists through the sink without failing the caller when the sink rejects', async () => {
    const sink: CallRecordSink = {
      append: vi.fn(async () => { throw new Error('store offline'); }),
      since: vi.fn(async () => []),
    };
    const t = tracker({ t: 0 }, sink);

    expect(() => t.record('nasa', { succeeded: true, latencyMs: 5 })).not.toThrow();
    await Promise.resolve();
    expect(sink.append).toHaveBeenCalledTimes(1);
    expect(t.healthScore('nasa')).toBe(1);
  });

  it('retries a sink write after a dropped connection', async () => {
    const append = vi.fn<(rec: ProviderCallRecord) => Promise<void>>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValue(undefined);
    const sink: CallRecordSink = { append, since: vi.fn(async () => []) };
    const t = new ProviderHealthTracker({ windowMs: 60 * MINUTE, neutralScore: 0.5, sink, sleep: async () => undefined });

    const rec = t.record('pexels', { succeeded: true, latencyMs: 12 });

    await vi.waitFor(() => expect(append).toHaveBeenCalledTimes(2));
    expect(append).toHaveBeenLastCalledWith(rec);
  });

  it('hydrates the trailing window from the sink', async () => {
    const now = Date.parse('2026-03-01T10:00:00Z');
    const history: ProviderCallRecord[] = [
      { provider: 'pixabay', requestSignature: '', succeeded: false, latencyMs: 50, errorDetail: '500', timestamp: new Date(now - 20 * MINUTE) },
      { provider: 'pixabay', requestSignature: '', succeeded: true, latencyMs: 40, errorDetail: null, timestamp: new Date(now - 10 * MINUTE) },
    ];
    const sink: CallRecordSink = { append: vi.fn(async () => undefined), since: vi.fn(async () => history) };
    const t = tracker({ t: now }, sink);

    expect(await t.hydrate()).toBe(2);
    expect(sink.since).toHaveBeenCalledWith(new Date(now - 60 * MINUTE));
    expect(t.healthScore('pixabay')).toBe(0.5);
  });
});
