import { extname } from 'node:path';
import type { MediaType } from '../types.js';

const DEFAULT_EXT: Record<MediaType, string> = { image: '.jpg', video: '.mp4', gif: '.gif' };

/** Extension from the URL path, or the usual one for the media type. */
export function extFromUrl(url: string, mediaType: MediaType): string {
  let ext = '';
  try {
    ext = extname(new URL(url).pathname).toLowerCase();
  } catch {
    ext = '';
  }
  return /^\.[a-z0-9]{2,5}$/.test(ext) ? ext : DEFAULT_EXT[mediaType];
}

export const resolution = (width?: number, height?: number) =>
  width && height ? `${width}x${height}` : undefined;
