/**
 * Media download into the cache directory. Fetching belongs to the provider
 * attempt; saving is local. Bytes land in a uniquely named `.part` file and
 * are renamed into place, so concurrent saves of the same clip never collide
 * and a crash never leaves a truncated payload under a cache path.
 */
import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PermanentProviderError } from '../errors.js';
import { request, transportError } from '../providers/http.js';
import { hashBuffer, hashFile } from '../utils/hash.js';

export interface DownloadResult {
  path: string;
  fileSize: number;
  fileHash: string;
}

export async function fetchMedia(provider: string, url: string, signal: AbortSignal): Promise<Buffer> {
  const res = await request(provider, url, { method: 'GET', signal });
  let bytes: Buffer;
  try {
    bytes = Buffer.from(await res.arrayBuffer());
  } catch (err) {
    throw transportError(provider, err);
  }
  if (bytes.length === 0) throw new PermanentProviderError(`${provider} served an empty file for ${url}`, provider);
  return bytes;
}

export async function saveMedia(destPath: string, bytes: Buffer): Promise<DownloadResult> {
  const result = { path: destPath, fileSize: bytes.length, fileHash: hashBuffer(bytes) };
  if ((await existingHash(destPath)) === result.fileHash) return result;

  await mkdir(dirname(destPath), { recursive: true });
  const partPath = `${destPath}.${randomUUID()}.part`;
  try {
    await writeFile(partPath, bytes);
    await rename(partPath, destPath);
  } catch (err) {
    await rm(partPath, { force: true });
    throw err;
  }
  return result;
}

async function existingHash(filePath: string): Promise<string | null> {
  try {
    return await hashFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}
