import { describe, expect, it } from 'vitest';
import { KeyedMutex } from './keyed-mutex.js';

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe('KeyedMutex', () => {
  it('runs work for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let counter = 0;

    const slowIncrement = (label: string) => mutex.runExclusive('nasa', async () => {
      events.push(`start:${label}`);
      const read = counter;
      await tick();
      counter = read + 1;
      events.push(`end:${label}`);
    });

    await Promise.all([slowIncrement('a'), slowIncrement('b'), slowIncrement('c')]);

    expect(counter).toBe(3);
    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  });

  it('does not block different keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((r) => { release = r; });

    const first = mutex.runExclusive('pexels', async () => {
      await gate;
      events.push('pexels');
    });
    await mutex.runExclusive('giphy', () => { events.push('giphy'); });
    release();
    await first;

    expect(events).toEqual(['giphy', 'pexels']);
  });

  it('keeps the queue moving after a rejected task', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', () => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(mutex.runExclusive('k', () => 42)).resolves.toBe(42);
    await tick();
    expect(mutex.isLocked('k')).toBe(false);
  });
});
