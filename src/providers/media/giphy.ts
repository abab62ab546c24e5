import { z } from 'zod';
import { PROVIDER_SETTINGS } from '../../config.js';
import { getJson } from '../http.js';
import { resolution } from './common.js';
import type { MediaCandidate, MediaProvider, MediaRequest } from '../types.js';

const SearchSchema = z.object({
  data: z.array(z.object({
    images: z.object({
      original: z.object({
        url:    z.string(),
        mp4:    z.string().optional(),
        width:  z.coerce.number().optional(),
        height: z.coerce.number().optional(),
      }),
    }),
  })),
});

/** Animated clips; only ever listed for video requests. */
export class GiphyMediaProvider implements MediaProvider {
  readonly name = 'giphy';
  readonly settings = PROVIDER_SETTINGS.giphy;

  constructor(private readonly apiKey: string) {}

  async searchOrGenerate(req: MediaRequest, signal: AbortSignal): Promise<MediaCandidate | null> {
    const url = `https://api.giphy.com/v1/gifs/search?${new URLSearchParams({ api_key: this.apiKey, q: req.query, limit: '1', rating: 'g' })}`;
    const body = await getJson(this.name, url, SearchSchema, { signal });
    const original = body.data[0]?.images.original;
    if (!original) return null;
    const res = resolution(original.width, original.height);
    return original.mp4
      ? { url: original.mp4, mediaType: 'video', resolution: res, ext: '.mp4' }
      : { url: original.url, mediaType: 'gif', resolution: res, ext: '.gif' };
  }
}
