import { z } from 'zod';
import { PROVIDER_SETTINGS } from '../../config.js';
import { getJson } from '../http.js';
import { extFromUrl, resolution } from './common.js';
import type { MediaCandidate, MediaProvider, MediaRequest } from '../types.js';

const ImageSchema = z.object({
  hits: z.array(z.object({
    largeImageURL: z.string(),
    imageWidth:    z.number().optional(),
    imageHeight:   z.number().optional(),
  })),
});

const VideoFileSchema = z.object({ url: z.string(), width: z.number().optional(), height: z.number().optional() });

const VideoSchema = z.object({
  hits: z.array(z.object({
    videos: z.object({ medium: VideoFileSchema.optional(), small: VideoFileSchema.optional() }),
  })),
});

export class PixabayMediaProvider implements MediaProvider {
  readonly name = 'pixabay';
  readonly settings = PROVIDER_SETTINGS.pixabay;

  constructor(private readonly apiKey: string) {}

  async searchOrGenerate(req: MediaRequest, signal: AbortSignal): Promise<MediaCandidate | null> {
    if (req.preferVideo) {
      const url = `https://pixabay.com/api/videos/?${new URLSearchParams({ key: this.apiKey, q: req.query, per_page: '3' })}`;
      const body = await getJson(this.name, url, VideoSchema, { signal });
      const file = body.hits.map((h) => h.videos.medium ?? h.videos.small).find((f) => f?.url);
      if (file) {
        return { url: file.url, mediaType: 'video', resolution: resolution(file.width, file.height), ext: extFromUrl(file.url, 'video') };
      }
    }

    const url = `https://pixabay.com/api/?${new URLSearchParams({ key: this.apiKey, q: req.query, image_type: 'photo', per_page: '3' })}`;
    const body = await getJson(this.name, url, ImageSchema, { signal });
    const hit = body.hits[0];
    if (!hit) return null;
    return {
      url: hit.largeImageURL,
      mediaType: 'image',
      resolution: resolution(hit.imageWidth, hit.imageHeight),
      ext: extFromUrl(hit.largeImageURL, 'image'),
    };
  }
}
