import { z } from 'zod';
import { PROVIDER_SETTINGS } from '../../config.js';
import { getJson } from '../http.js';
import { resolution } from './common.js';
import type { MediaCandidate, MediaProvider, MediaRequest } from '../types.js';

const SearchSchema = z.object({
  results: z.array(z.object({
    width:  z.number().optional(),
    height: z.number().optional(),
    urls:   z.object({ regular: z.string() }),
  })),
});

export class UnsplashMediaProvider implements MediaProvider {
  readonly name = 'unsplash';
  readonly settings = PROVIDER_SETTINGS.unsplash;

  constructor(private readonly accessKey: string) {}

  async searchOrGenerate(req: MediaRequest, signal: AbortSignal): Promise<MediaCandidate | null> {
    const url = `https://api.unsplash.com/search/photos?${new URLSearchParams({ query: req.query, per_page: '1', orientation: 'landscape' })}`;
    const body = await getJson(this.name, url, SearchSchema, {
      signal,
      headers: { Authorization: `Client-ID ${this.accessKey}`, 'Accept-Version': 'v1' },
    });
    const photo = body.results[0];
    if (!photo) return null;
    // Unsplash serves images through an imgix URL without an extension
    return { url: photo.urls.regular, mediaType: 'image', resolution: resolution(photo.width, photo.height), ext: '.jpg' };
  }
}
