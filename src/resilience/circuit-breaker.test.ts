import { beforeEach, describe, expect, it } from 'vitest';
import { CircuitBreaker } from './circuit-breaker.js';

describe('CircuitBreaker', () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = Date.parse('2026-03-01T12:00:00.000Z');
    breaker = new CircuitBreaker({ failureThreshold: 5, cooldownMs: 60_000, now: () => new Date(clock) });
  });

  async function fail(provider: string, times: number): Promise<void> {
    for (let i = 0; i < times; i++) await breaker.report(provider, false);
  }

  it('stays closed below the threshold', async () => {
    await fail('nasa', 4);

    expect(await breaker.allow('nasa')).toBe(true);
    expect(breaker.state('nasa')).toMatchObject({ status: 'CLOSED', consecutiveFailures: 4 });
  });

  it('opens after five consecutive failures and refuses calls during cooldown', async () => {
    await fail('nasa', 5);

    expect(breaker.state('nasa').status).toBe('OPEN');
    expect(await breaker.allow('nasa')).toBe(false);

    clock += 59_999;
    expect(await breaker.allow('nasa')).toBe(false);
  });

  it('a success resets the failure streak', async () => {
    await fail('nasa', 4);
    await breaker.report('nasa', true);
    await fail('nasa', 4);

    expect(breaker.state('nasa').status).toBe('CLOSED');
  });

  it('ignores a late success while open and waits out the cooldown', async () => {
    await fail('nasa', 5);

    expect(await breaker.report('nasa', true)).toBe('OPEN');
    expect(await breaker.allow('nasa')).toBe(false);
    expect(breaker.state('nasa').openedAt?.getTime()).toBe(clock);

    clock += 60_000;
    expect(await breaker.allow('nasa')).toBe(true);
  });

  it('grants exactly one half-open probe after the cooldown, then re-closes on success', async () => {
    await fail('nasa', 5);
    clock += 60_000;

    expect(breaker.state('nasa').status).toBe('HALF_OPEN');
    expect(await breaker.allow('nasa')).toBe(true);
    expect(await breaker.allow('nasa')).toBe(false);

    expect(await breaker.report('nasa', true)).toBe('CLOSED');
    expect(await breaker.allow('nasa')).toBe(true);
    expect(breaker.state('nasa')).toEqual({ status: 'CLOSED', consecutiveFailures: 0, openedAt: null, probeInFlight: false });
  });

  it('re-opens with a fresh cooldown when the probe fails', async () => {
    await fail('nasa', 5);
    clock += 60_000;
    await breaker.allow('nasa');

    expect(await breaker.report('nasa', false)).toBe('OPEN');
    expect(breaker.state('nasa').openedAt?.getTime()).toBe(clock);

    clock += 30_000;
    expect(await breaker.allow('nasa')).toBe(false);
    clock += 30_000;
    expect(await breaker.allow('nasa')).toBe(true);
  });

  it('hands out a single probe to concurrent callers', async () => {
    await fail('pixabay', 5);
    clock += 60_000;

    const grants = await Promise.all([breaker.allow('pixabay'), breaker.allow('pixabay'), breaker.allow('pixabay')]);

    expect(grants.filter(Boolean)).toHaveLength(1);
  });

  it('does not lose concurrent failure reports', async () => {
    await Promise.all(Array.from({ length: 5 }, () => breaker.report('pexels', false)));

    expect(breaker.state('pexels')).toMatchObject({ status: 'OPEN', consecutiveFailures: 5 });
  });

  it('keeps providers independent', async () => {
    await fail('nasa', 5);

    expect(breaker.snapshot(['nasa', 'pixabay'])).toEqual({ nasa: 'OPEN', pixabay: 'CLOSED' });
    expect(breaker.isOpen('pixabay')).toBe(false);
  });
});
