import { z } from 'zod';
import { PROVIDER_SETTINGS } from '../../config.js';
import { getJson } from '../http.js';
import { extFromUrl, resolution } from './common.js';
import type { MediaCandidate, MediaProvider, MediaRequest } from '../types.js';

const PhotoSchema = z.object({
  photos: z.array(z.object({
    width:  z.number().optional(),
    height: z.number().optional(),
    src:    z.object({ large2x: z.string().optional(), large: z.string() }),
  })),
});

const VideoSchema = z.object({
  videos: z.array(z.object({
    video_files: z.array(z.object({
      link:      z.string(),
      file_type: z.string().nullable().optional(),
      width:     z.number().nullable().optional(),
      height:    z.number().nullable().optional(),
    })),
  })),
});

/** Largest mp4 rendition not wider than 1920. */
function pickVideoFile(files: z.infer<typeof VideoSchema>['videos'][number]['video_files']) {
  return files
    .filter((f) => f.file_type === 'video/mp4' && (f.width ?? 0) <= 1920)
    .sort((a, b) => (b.width ?? 0) - (a.width ?? 0))[0];
}

export class PexelsMediaProvider implements MediaProvider {
  readonly name = 'pexels';
  readonly settings = PROVIDER_SETTINGS.pexels;

  constructor(private readonly apiKey: string) {}

  async searchOrGenerate(req: MediaRequest, signal: AbortSignal): Promise<MediaCandidate | null> {
    const headers = { Authorization: this.apiKey };

    if (req.preferVideo) {
      const url = `https://api.pexels.com/videos/search?${new URLSearchParams({ query: req.query, per_page: '3' })}`;
      const body = await getJson(this.name, url, VideoSchema, { signal, headers });
      const file = body.videos.map((v) => pickVideoFile(v.video_files)).find((f) => f !== undefined);
      if (file) {
        return {
          url: file.link,
          mediaType: 'video',
          resolution: resolution(file.width ?? undefined, file.height ?? undefined),
          ext: extFromUrl(file.link, 'video'),
        };
      }
    }

    const url = `https://api.pexels.com/v1/search?${new URLSearchParams({ query: req.query, per_page: '1' })}`;
    const body = await getJson(this.name, url, PhotoSchema, { signal, headers });
    const photo = body.photos[0];
    if (!photo) return null;
    const src = photo.src.large2x ?? photo.src.large;
    return { url: src, mediaType: 'image', resolution: resolution(photo.width, photo.height), ext: extFromUrl(src, 'image') };
  }
}
