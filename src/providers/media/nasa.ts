/**
 * NASA Image and Video Library. No key needed.
 * Only stills are used; the library's video assets need a second manifest call.
 */
import { z } from 'zod';
import { PROVIDER_SETTINGS } from '../../config.js';
import { getJson } from '../http.js';
import { extFromUrl } from './common.js';
import type { MediaCandidate, MediaProvider, MediaRequest } from '../types.js';

const SearchSchema = z.object({
  collection: z.object({
    items: z.array(z.object({
      links: z.array(z.object({ href: z.string(), render: z.string().optional() })).optional(),
    })),
  }),
});

export class NasaMediaProvider implements MediaProvider {
  readonly name = 'nasa';
  readonly settings = PROVIDER_SETTINGS.nasa;

  async searchOrGenerate(req: MediaRequest, signal: AbortSignal): Promise<MediaCandidate | null> {
    const url = `https://images-api.nasa.gov/search?${new URLSearchParams({ q: req.query, media_type: 'image' })}`;
    const body = await getJson(this.name, url, SearchSchema, { signal });
    const link = body.collection.items
      .flatMap((item) => item.links ?? [])
      .find((l) => l.render === undefined || l.render === 'image');
    if (!link) return null;
    return { url: link.href, mediaType: 'image', ext: extFromUrl(link.href, 'image') };
  }
}
