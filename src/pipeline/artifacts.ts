/**
 * Cache-first artifact resolution for one job.
 *
 * Every required artifact (script, transcript, per-segment media) is looked
 * up by its deterministic key first. A hit is touched and counted; a miss
 * goes through the FallbackRouter and the result is written back. Failed
 * provider attempts land in the job's error log before the next provider is
 * tried. If the cache backend itself fails, the job carries on without it.
 */
import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { mediaKey, scriptKey, transcriptKey } from '../cache/keys.js';
import { CacheBackendError, errorMessage } from '../errors.js';
import { fetchMedia, saveMedia } from '../media/download.js';
import { telegram } from '../monitoring/telegram.js';
import { hashFile } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';
import type { RenderPreset, RequestType } from '../config.js';
import type { CacheStore } from '../cache/store.js';
import type { ArtifactKind, CacheEntry, CacheMetadataByKind } from '../cache/types.js';
import type { JobLedger } from '../jobs/ledger.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type {
  ArtifactProvider,
  MediaCandidate,
  MediaRequest,
  MediaType,
  Transcript,
} from '../providers/types.js';
import type { FallbackRouter, RouteResult } from '../resilience/router.js';
import type { Article } from './collaborators.js';

const log = createLogger('artifacts');

const TranscriptFileSchema = z.object({
  segments: z.array(z.object({ start: z.number(), end: z.number(), text: z.string() })),
  durationSec: z.number(),
});

export interface ArtifactResolverDeps {
  cache: CacheStore;
  router: FallbackRouter;
  ledger: JobLedger;
  providers: ProviderRegistry;
  /** Root for cached payloads: scripts/, transcripts/, media/. */
  cacheDir: string;
  preset: RenderPreset;
  scriptTargetWords: number;
}

export interface Resolved<T> {
  value: T;
  /** `null` on a cache hit. */
  provider: string | null;
  cached: boolean;
}

export interface ResolvedMedia {
  path: string;
  mediaType: MediaType;
}

interface FetchedMedia extends MediaCandidate {
  bytes: Buffer;
}

interface RouteContext {
  requestType: RequestType;
  signature: string;
  segment?: number;
}

export class ArtifactResolver {
  private cacheUsable = true;

  constructor(private readonly jobId: string, private readonly deps: ArtifactResolverDeps) {}

  /** False once the cache backend has failed during this job. */
  get cacheAvailable(): boolean {
    return this.cacheUsable;
  }

  // ── Script ──────────────────────────────────────────────────────────────────

  async script(articles: readonly Article[]): Promise<Resolved<string>> {
    const key = scriptKey(articles);
    const enabled = this.deps.preset.enableScriptCache;

    const hit = await this.lookup('script', [key], enabled, (entry) => readFile(entry.payloadRef, 'utf8'));
    if (hit !== null) return { value: hit, provider: null, cached: true };

    const result = await this.route(
      this.deps.providers.script,
      { articles, targetWords: this.deps.scriptTargetWords },
      { requestType: 'script', signature: `script:${key.slice(0, 12)}` },
    );
    const { text, model } = result.artifact;

    // Template scripts are never cached.
    if (result.provider !== 'template') {
      await this.store('script', key, enabled, async () => {
        const ref = await this.payloadPath('scripts', `${key}.txt`);
        await writeFile(ref, text, 'utf8');
        return {
          ref,
          metadata: { provider: result.provider, model, wordCount: text.split(/\s+/).filter(Boolean).length },
        };
      });
    }
    return { value: text, provider: result.provider, cached: false };
  }

  // ── Transcript ──────────────────────────────────────────────────────────────

  async transcript(audioPath: string, modelSize: string): Promise<Resolved<Transcript>> {
    const key = transcriptKey(await hashFile(audioPath), modelSize);
    const enabled = this.deps.preset.enableTranscriptCache;

    const hit = await this.lookup('transcript', [key], enabled, async (entry) =>
      TranscriptFileSchema.parse(JSON.parse(await readFile(entry.payloadRef, 'utf8'))),
    );
    if (hit !== null) return { value: hit, provider: null, cached: true };

    const result = await this.route(
      this.deps.providers.transcript,
      { audioPath, modelSize },
      { requestType: 'transcript', signature: `transcript:${key.slice(0, 12)}:${modelSize}` },
    );
    const transcript = result.artifact;

    await this.store('transcript', key, enabled, async () => {
      const ref = await this.payloadPath('transcripts', `${key}.json`);
      await writeFile(ref, JSON.stringify(transcript, null, 2), 'utf8');
      return {
        ref,
        metadata: { model: modelSize, durationSec: transcript.durationSec, segmentCount: transcript.segments.length },
      };
    });
    return { value: transcript, provider: result.provider, cached: false };
  }

  // ── Media ───────────────────────────────────────────────────────────────────

  /**
   * Tries each listed provider's key in priority order before going to the
   * network, so a clip cached from any provider is reused.
   */
  async media(request: MediaRequest, segment: number): Promise<Resolved<ResolvedMedia>> {
    const requestType: RequestType = request.preferVideo ? 'media_video' : 'media_image';
    const providers = this.deps.providers[requestType];
    const enabled = this.deps.preset.enableMediaCache;
    const keys = providers.map((p) => mediaKey(request.query, p.name));

    const hit = await this.lookup('media', keys, enabled, async (entry) => ({
      path: entry.payloadRef,
      mediaType: entry.metadata.mediaType,
    }));
    if (hit !== null) return { value: hit, provider: null, cached: true };

    const result = await this.route(
      providers.map((p) => this.downloading(p)),
      request,
      { requestType, signature: `${requestType}:${request.query}`, segment },
    );
    const key = mediaKey(request.query, result.provider);
    const { bytes, ...candidate } = result.artifact;
    const media = { ...candidate, ...(await saveMedia(path.join(this.deps.cacheDir, 'media', `${key}${candidate.ext}`), bytes)) };

    await this.store('media', key, enabled, async () => ({
      ref: media.path,
      metadata: {
        query: request.query,
        provider: result.provider,
        mediaType: media.mediaType,
        sourceUrl: media.url,
        resolution: media.resolution,
        fileSize: media.fileSize,
        fileHash: media.fileHash,
      },
    }));
    return { value: { path: media.path, mediaType: media.mediaType }, provider: result.provider, cached: false };
  }

  /**
   * Search, then fetch the bytes inside the same attempt so a bad file counts
   * against its provider. Saving to disk happens after routing.
   */
  private downloading(provider: ArtifactProvider<MediaRequest, MediaCandidate>): ArtifactProvider<MediaRequest, FetchedMedia> {
    return {
      name: provider.name,
      settings: provider.settings,
      searchOrGenerate: async (req, signal) => {
        const candidate = await provider.searchOrGenerate(req, signal);
        if (candidate === null) return null;
        return { ...candidate, bytes: await fetchMedia(provider.name, candidate.url, signal) };
      },
    };
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  /**
   * First live entry among `keys` whose payload is still readable. A missing
   * or unreadable payload counts as a miss.
   */
  private async lookup<K extends ArtifactKind, T>(
    kind: K,
    keys: readonly string[],
    enabled: boolean,
    load: (entry: CacheEntry<K>) => Promise<T>,
  ): Promise<T | null> {
    if (!enabled || !this.cacheUsable) return null;
    for (const key of keys) {
      let entry: CacheEntry<K> | null;
      try {
        entry = await this.deps.cache.lookup(kind, key);
      } catch (err) {
        await this.degrade(err);
        return null;
      }
      if (!entry) continue;

      let value: T;
      try {
        await access(entry.payloadRef);
        value = await load(entry);
      } catch (err) {
        log.warn('Cached payload unreadable — treating as miss', { kind, key, payloadRef: entry.payloadRef, error: errorMessage(err) });
        continue;
      }
      try {
        await this.deps.cache.touch(kind, key);
      } catch (err) {
        await this.degrade(err);
      }
      this.deps.ledger.incrementMetric(this.jobId, 'cache_hits');
      log.debug('Cache hit', { kind, key });
      return value;
    }
    this.deps.ledger.incrementMetric(this.jobId, 'cache_misses');
    return null;
  }

  private async store<K extends ArtifactKind>(
    kind: K,
    key: string,
    enabled: boolean,
    write: () => Promise<{ ref: string; metadata: CacheMetadataByKind[K] }>,
  ): Promise<void> {
    if (!enabled || !this.cacheUsable) return;
    let payload: { ref: string; metadata: CacheMetadataByKind[K] };
    try {
      payload = await write();
    } catch (err) {
      // The artifact is already in hand; only the cached copy is lost.
      const failure = new CacheBackendError(`Cache write ${kind} failed: ${errorMessage(err)}`, { cause: err });
      log.warn('Could not write cached payload — continuing uncached', { jobId: this.jobId, kind, key, error: failure.message });
      await this.deps.ledger.recordError(this.jobId, failure);
      return;
    }
    try {
      await this.deps.cache.put(kind, key, payload.ref, payload.metadata);
    } catch (err) {
      await this.degrade(err);
    }
  }

  private async route<Req, Art>(
    providers: readonly ArtifactProvider<Req, Art>[],
    request: Req,
    ctx: RouteContext,
  ): Promise<RouteResult<Art>> {
    return this.deps.router.fetch(providers, request, {
      requestType: ctx.requestType,
      signature: ctx.signature,
      onAttempt: async (attempt) => {
        if (attempt.calls > 0) this.deps.ledger.incrementMetric(this.jobId, 'api_calls_made');
        if (attempt.outcome === 'failed') {
          await this.deps.ledger.recordError(this.jobId, attempt.error, { provider: attempt.provider, segment: ctx.segment });
        }
      },
    });
  }

  /** Cache backend down: finish the job without it and say so once. */
  private async degrade(err: unknown): Promise<void> {
    if (!(err instanceof CacheBackendError)) throw err;
    if (!this.cacheUsable) return;
    this.cacheUsable = false;
    log.warn('Cache backend failed — continuing without cache', { jobId: this.jobId, error: err.message });
    await this.deps.ledger.recordError(this.jobId, err);
    await telegram.alert(`Cache backend unavailable for job ${this.jobId}; running without cache. ${err.message}`);
  }

  private async payloadPath(dir: string, file: string): Promise<string> {
    const full = path.join(this.deps.cacheDir, dir);
    await mkdir(full, { recursive: true });
    return path.join(full, file);
  }
}
