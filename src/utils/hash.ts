import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const hashString = (input: string) => createHash('sha256').update(input).digest('hex');

export const hashBuffer = (input: Buffer) => createHash('sha256').update(input).digest('hex');

/** Streams the file so large media and audio never sit fully in memory. */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(filePath)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/** Lower-case and collapse whitespace so equivalent search queries share a key. */
export const normalizeQuery = (query: string) => query.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
