/**
 * News video pipeline — one run from articles to a finished MP4.
 *
 *   fetching_news → generating_script → generating_narration → transcribing
 *     → processing_media (per segment, batched) → building_video
 *
 * Script, transcript and media go through the ArtifactResolver (cache first,
 * then provider fallback). A segment whose media is exhausted is rendered on
 * the configured fallback image; without one it fails. The job completes when
 * enough segments rendered, otherwise it fails. Transcript exhaustion fails
 * the job outright.
 */
import { access, mkdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { AllProvidersExhaustedError, ResourceExhaustionError, errorMessage } from '../errors.js';
import { telegram } from '../monitoring/telegram.js';
import { hashString } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';
import { ArtifactResolver } from './artifacts.js';
import { runInBatches } from './pool.js';
import { planSegments, type SegmentPlan } from './segments.js';
import type { RenderPreset } from '../config.js';
import type { CacheStore } from '../cache/store.js';
import type { JobLedger } from '../jobs/ledger.js';
import type { Job } from '../jobs/types.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { FallbackRouter } from '../resilience/router.js';
import type { ResourceGovernor } from '../resources/governor.js';
import type { ArticleSource, NarrationSynthesizer, RenderEngine, RenderSegment } from './collaborators.js';

const log = createLogger('pipeline');

export interface PipelineSettings {
  presetName: string;
  preset: RenderPreset;
  outputDir: string;
  cacheDir: string;
  fallbackImagePath: string | null;
  minSegments: number;
  transcriptionModel: string;
  videoThresholdSec: number;
  segmentOutputBytes: number;
  scriptTargetWords: number;
}

export interface PipelineDeps {
  ledger: JobLedger;
  cache: CacheStore;
  router: FallbackRouter;
  governor: ResourceGovernor;
  providers: ProviderRegistry;
  articles: ArticleSource;
  narrator: NarrationSynthesizer;
  renderer: RenderEngine;
  settings: PipelineSettings;
}

export interface PipelineResult {
  job: Job;
  outputPath: string | null;
  segments: number;
  degradedSegments: number;
  failedSegments: number;
}

interface SegmentOutcome {
  index: number;
  clipPath: string;
  degraded: boolean;
}

export async function runPipeline(deps: PipelineDeps, name = `news ${new Date().toISOString()}`): Promise<PipelineResult> {
  const { ledger, settings } = deps;
  const job = await ledger.create(name, settings.presetName);
  const id = job.id;
  const resolver = new ArtifactResolver(id, {
    cache: deps.cache,
    router: deps.router,
    ledger,
    providers: deps.providers,
    cacheDir: settings.cacheDir,
    preset: settings.preset,
    scriptTargetWords: settings.scriptTargetWords,
  });
  const workDir = path.join(settings.outputDir, id);
  let segments = 0;
  let degradedSegments = 0;
  let failedSegments = 0;

  try {
    // ── Articles ──────────────────────────────────────────────────────────────
    await ledger.advance(id, 'fetching_news', 0);
    const articles = await deps.articles.fetch(settings.preset.articlesPerFeed);
    if (articles.length === 0) throw new Error('No articles to narrate');
    log.info('Articles loaded', { jobId: id, count: articles.length });

    // ── Script ────────────────────────────────────────────────────────────────
    await ledger.checkpoint(id);
    await ledger.advance(id, 'generating_script', 0);
    const script = await resolver.script(articles);
    ledger.setScriptHash(id, hashString(script.value));
    log.info('Script ready', { jobId: id, cached: script.cached, provider: script.provider });

    // ── Narration ─────────────────────────────────────────────────────────────
    await ledger.checkpoint(id);
    await ledger.advance(id, 'generating_narration', 0);
    const narrationPath = await narrate(deps, script.value);

    // ── Transcript ────────────────────────────────────────────────────────────
    await ledger.checkpoint(id);
    await ledger.advance(id, 'transcribing', 0);
    const transcript = await resolver.transcript(narrationPath, settings.transcriptionModel);
    const plans = planSegments(transcript.value.segments, settings.videoThresholdSec);
    if (plans.length === 0) throw new Error('Transcript has no segments');
    segments = plans.length;

    // ── Media + render ────────────────────────────────────────────────────────
    await ledger.advance(id, 'processing_media', 0, plans.length);
    let processed = 0;
    const settled = await runInBatches(plans, {
      governor: deps.governor,
      outputBytesPerItem: settings.segmentOutputBytes,
      checkpoint: () => ledger.checkpoint(id),
      onDecision: async (decision) => {
        ledger.setMetric(id, 'workers', decision.workers);
        if (decision.lowDisk) {
          const freeGb = (decision.snapshot.freeDiskBytes / 1024 ** 3).toFixed(1);
          await ledger.recordError(id, new ResourceExhaustionError(`Low disk: ${freeGb} GB free; running ${decision.workers} worker(s)`));
        }
      },
      task: async (plan) => {
        const outcome = await renderSegment(deps, resolver, id, plan, workDir);
        processed++;
        await ledger.advance(id, 'processing_media', processed);
        return outcome;
      },
    });

    const rendered: SegmentOutcome[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') rendered.push(result.value);
      else failedSegments++;
    }
    rendered.sort((a, b) => a.index - b.index);
    degradedSegments = rendered.filter((s) => s.degraded).length;
    ledger.setMetric(id, 'segments_degraded', degradedSegments);
    ledger.setMetric(id, 'segments_failed', failedSegments);

    if (rendered.length === 0 || rendered.length < settings.minSegments) {
      throw new Error(`Only ${rendered.length} of ${plans.length} segments rendered; ${settings.minSegments} required`);
    }

    // ── Assembly ──────────────────────────────────────────────────────────────
    await ledger.checkpoint(id);
    await ledger.advance(id, 'building_video', rendered.length, plans.length);
    const outputPath = await deps.renderer.assemble(
      rendered.map((s) => s.clipPath),
      narrationPath,
      path.join(settings.outputDir, `${id}.mp4`),
      settings.preset,
    );

    const done = await ledger.finish(id, { status: 'completed', outputPath });
    await report(done, { segments, degradedSegments, failedSegments }, outputPath);
    return { job: done, outputPath, segments, degradedSegments, failedSegments };
  } catch (err) {
    log.error('Pipeline run failed', { jobId: id, error: errorMessage(err) });
    await ledger.recordError(id, err);
    const failed = await ledger.finish(id, { status: 'failed' });
    await report(failed, { segments, degradedSegments, failedSegments }, null);
    await telegram.error(`Render job ${id} failed: ${errorMessage(err)}`);
    return { job: failed, outputPath: null, segments, degradedSegments, failedSegments };
  }
}

/**
 * Narration audio is kept beside the cache, keyed by the script text, so a
 * re-run of the same script transcribes byte-identical audio.
 */
async function narrate(deps: PipelineDeps, script: string): Promise<string> {
  const target = path.join(deps.settings.cacheDir, 'narration', `${hashString(script)}.mp3`);
  const existing = await stat(target).catch(() => null);
  if (existing && existing.size > 0) {
    log.info('Reusing narration audio', { path: target });
    return target;
  }
  await mkdir(path.dirname(target), { recursive: true });
  return deps.narrator.synthesize(script, target);
}

async function renderSegment(
  deps: PipelineDeps,
  resolver: ArtifactResolver,
  jobId: string,
  plan: SegmentPlan,
  workDir: string,
): Promise<SegmentOutcome> {
  const { ledger, settings } = deps;
  let visual: Pick<RenderSegment, 'visualPath' | 'mediaType' | 'degraded'>;

  try {
    const media = await resolver.media({ query: plan.query, preferVideo: plan.preferVideo }, plan.index);
    visual = { visualPath: media.value.path, mediaType: media.value.mediaType, degraded: false };
  } catch (err) {
    if (!(err instanceof AllProvidersExhaustedError)) throw err;
    await ledger.recordError(jobId, err, { segment: plan.index });
    if (!settings.fallbackImagePath) throw err;
    await access(settings.fallbackImagePath);
    log.warn('Segment degraded to fallback image', { jobId, segment: plan.index, query: plan.query });
    visual = { visualPath: settings.fallbackImagePath, mediaType: 'image', degraded: true };
  }

  const segment: RenderSegment = {
    index: plan.index,
    text: plan.text,
    startSec: plan.startSec,
    durationSec: plan.durationSec,
    ...visual,
  };
  try {
    const clipPath = await deps.renderer.renderSegment(segment, workDir, settings.preset);
    return { index: plan.index, clipPath, degraded: visual.degraded };
  } catch (err) {
    await ledger.recordError(jobId, err, { kind: 'render', segment: plan.index });
    throw err;
  }
}

async function report(
  job: Job,
  counts: { segments: number; degradedSegments: number; failedSegments: number },
  outputPath: string | null,
): Promise<void> {
  await telegram.jobReport({
    jobId: job.id,
    status: job.status,
    ...counts,
    cacheHits: job.performanceMetrics['cache_hits'] ?? 0,
    apiCalls: job.performanceMetrics['api_calls_made'] ?? 0,
    elapsedMs: job.performanceMetrics['elapsed_ms'] ?? 0,
    ...(outputPath ? { outputPath } : {}),
  });
}
