import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fetchMedia, saveMedia } from './download.js';
import { PermanentProviderError } from '../errors.js';
import { hashString } from '../utils/hash.js';

describe('saveMedia', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'download-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the file and reports its size and hash', async () => {
    const dest = path.join(dir, 'media', 'clip.jpg');

    const saved = await saveMedia(dest, Buffer.from('jpeg-bytes'));

    expect(saved).toEqual({ path: dest, fileSize: 10, fileHash: hashString('jpeg-bytes') });
    await expect(readFile(dest, 'utf8')).resolves.toBe('jpeg-bytes');
  });

  it('lets concurrent saves of the same clip converge on one file', async () => {
    const dest = path.join(dir, 'media', 'clip.jpg');

    await Promise.all(Array.from({ length: 5 }, () => saveMedia(dest, Buffer.from('jpeg-bytes'))));

    expect(await readdir(path.join(dir, 'media'))).toEqual(['clip.jpg']);
    await expect(readFile(dest, 'utf8')).resolves.toBe('jpeg-bytes');
  });

  it('replaces a file whose contents differ', async () => {
    const dest = path.join(dir, 'clip.jpg');
    await writeFile(dest, 'truncated', 'utf8');

    const saved = await saveMedia(dest, Buffer.from('jpeg-bytes'));

    expect(saved.fileHash).toBe(hashString('jpeg-bytes'));
    await expect(readFile(dest, 'utf8')).resolves.toBe('jpeg-bytes');
  });
});

describe('fetchMedia', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('rejects an empty body as a permanent provider error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 200 })));

    const err = await fetchMedia('pixabay', 'https://cdn.pixabay.test/empty.jpg', new AbortController().signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PermanentProviderError);
    expect(err).toHaveProperty('message', 'pixabay served an empty file for https://cdn.pixabay.test/empty.jpg');
  });
});
