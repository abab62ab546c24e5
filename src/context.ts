/**
 * Wires the long-lived components from configuration. Supabase-backed
 * repositories when a store is configured, in-process ones otherwise.
 */
import { mkdirSync } from 'node:fs';
import { CACHE, GOVERNOR, PIPELINE, RESILIENCE, env, getPreset, providerCredential } from './config.js';
import { CacheStore } from './cache/store.js';
import { MemoryCacheRepository } from './cache/memory-repository.js';
import { SupabaseCacheRepository } from './cache/supabase-repository.js';
import { getSupabase, isStoreConfigured } from './db/client.js';
import { JobLedger } from './jobs/ledger.js';
import { MemoryJobRepository } from './jobs/memory-repository.js';
import { SupabaseJobRepository } from './jobs/supabase-repository.js';
import { FfmpegRenderEngine } from './media/ffmpeg.js';
import { OpenAINarrationSynthesizer } from './media/narration.js';
import { JsonFileArticleSource } from './pipeline/articles.js';
import { buildRegistry } from './providers/registry.js';
import { CircuitBreaker } from './resilience/circuit-breaker.js';
import { ProviderHealthTracker, SupabaseCallRecordSink } from './resilience/health.js';
import { FallbackRouter } from './resilience/router.js';
import { NodeHostProbe, ResourceGovernor } from './resources/governor.js';
import { errorMessage } from './errors.js';
import { createLogger } from './utils/logger.js';
import type { PipelineDeps } from './pipeline/index.js';

const log = createLogger('context');

export interface AppContext {
  cache: CacheStore;
  ledger: JobLedger;
  breaker: CircuitBreaker;
  health: ProviderHealthTracker;
  router: FallbackRouter;
}

export async function createContext(): Promise<AppContext> {
  const persistent = isStoreConfigured();
  const db = persistent ? getSupabase() : null;
  if (!db) log.warn('SUPABASE_URL / SUPABASE_SERVICE_KEY not set — cache, jobs and call history live in memory only');

  const cache = new CacheStore(db ? new SupabaseCacheRepository(db) : new MemoryCacheRepository(), {
    ttlMs: CACHE.ttlMs,
    backendAttempts: env.STORE_WRITE_ATTEMPTS,
  });
  const ledger = new JobLedger(db ? new SupabaseJobRepository() : new MemoryJobRepository(), { pollMs: PIPELINE.pausePollMs });
  const breaker = new CircuitBreaker({ failureThreshold: RESILIENCE.failureThreshold, cooldownMs: RESILIENCE.cooldownMs });
  const health = new ProviderHealthTracker({
    windowMs: RESILIENCE.healthWindowMs,
    neutralScore: RESILIENCE.neutralScore,
    sinkAttempts: env.STORE_WRITE_ATTEMPTS,
    ...(db ? { sink: new SupabaseCallRecordSink(db) } : {}),
  });
  try {
    await health.hydrate();
  } catch (err) {
    log.warn('Could not load provider call history — starting from neutral scores', { error: errorMessage(err) });
  }
  const router = new FallbackRouter({
    breaker,
    health,
    minHealthScore: RESILIENCE.minHealthScore,
    maxDelayMs: RESILIENCE.maxDelayMs,
  });
  return { cache, ledger, breaker, health, router };
}

/** Full dependency set for one pipeline run, using the default collaborators. */
export function pipelineDeps(ctx: AppContext, articlesFile: string): PipelineDeps {
  const openaiKey = providerCredential('openai');
  if (openaiKey === null) throw new Error('OPENAI_API_KEY is required for narration');

  const preset = getPreset(PIPELINE.preset);
  mkdirSync(CACHE.dir, { recursive: true });
  mkdirSync(PIPELINE.outputDir, { recursive: true });

  return {
    ledger: ctx.ledger,
    cache: ctx.cache,
    router: ctx.router,
    governor: new ResourceGovernor(new NodeHostProbe(PIPELINE.outputDir), { ...GOVERNOR, ceiling: preset.maxWorkers }),
    providers: buildRegistry(),
    articles: new JsonFileArticleSource(articlesFile),
    narrator: new OpenAINarrationSynthesizer(openaiKey, env.OPENAI_TTS_VOICE),
    renderer: new FfmpegRenderEngine(),
    settings: {
      presetName: PIPELINE.preset,
      preset,
      outputDir: PIPELINE.outputDir,
      cacheDir: CACHE.dir,
      fallbackImagePath: PIPELINE.fallbackImagePath,
      minSegments: PIPELINE.minSegments,
      transcriptionModel: PIPELINE.transcriptionModel,
      videoThresholdSec: PIPELINE.videoThresholdSec,
      segmentOutputBytes: GOVERNOR.segmentOutputBytes,
      scriptTargetWords: PIPELINE.scriptTargetWords,
    },
  };
}
