import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { getJson, statusError, transportError } from './http.js';
import { PermanentProviderError, TransientProviderError } from '../errors.js';

const Schema = z.object({ total: z.number() });
const signal = new AbortController().signal;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('statusError', () => {
  it.each([408, 429, 500, 503])('treats %i as transient', (status) => {
    expect(statusError('pexels', status, 'busy')).toBeInstanceOf(TransientProviderError);
  });

  it.each([400, 401, 403, 404])('treats %i as permanent', (status) => {
    expect(statusError('pexels', status, 'nope')).toBeInstanceOf(PermanentProviderError);
  });

  it('includes the status and a trimmed body in the message', () => {
    expect(statusError('pexels', 503, 'busy').message).toBe('pexels responded 503: busy');
    expect(statusError('pexels', 404, '').message).toBe('pexels responded 404');
    expect(statusError('pexels', 500, 'x'.repeat(500)).message).toHaveLength('pexels responded 500: '.length + 200);
  });
});

describe('transportError', () => {
  it('maps aborts and connection failures to transient errors', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    expect(transportError('nasa', abort).message).toBe('nasa request aborted');
    expect(transportError('nasa', new TypeError('fetch failed'))).toBeInstanceOf(TransientProviderError);
  });

  it('passes classified errors through untouched', () => {
    const err = new PermanentProviderError('bad key', 'nasa');
    expect(transportError('nasa', err)).toBe(err);
  });
});

describe('getJson', () => {
  it('returns the parsed body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ total: 3 }), { status: 200 })));

    await expect(getJson('nasa', 'https://example.test/search', Schema, { signal })).resolves.toEqual({ total: 3 });
  });

  it('reports a network failure as transient', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));

    const err = await getJson('nasa', 'https://example.test/search', Schema, { signal }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientProviderError);
    expect(err).toHaveProperty('message', 'nasa unreachable: fetch failed');
  });

  it('reports a non-JSON body as permanent', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>maintenance</html>', { status: 200 })));

    const err = await getJson('nasa', 'https://example.test/search', Schema, { signal }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PermanentProviderError);
    expect(String(err)).toContain('nasa returned a non-JSON body');
  });

  it('reports a payload of the wrong shape as permanent', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ total: 'many' }), { status: 200 })));

    const err = await getJson('nasa', 'https://example.test/search', Schema, { signal }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PermanentProviderError);
    expect(String(err)).toContain('nasa returned an unexpected payload');
  });

  it('classifies error statuses before reading the body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('slow down', { status: 429 })));

    const err = await getJson('nasa', 'https://example.test/search', Schema, { signal }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientProviderError);
    expect(err).toHaveProperty('message', 'nasa responded 429: slow down');
  });
});
