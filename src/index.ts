#!/usr/bin/env node
/**
 * newsreel — entry point.
 *
 * `server` (the default) runs as a persistent process with node-cron
 * schedules for the pipeline and cache eviction. The other commands run once
 * and exit; `pause`, `resume` and `status` act on jobs owned by another
 * process through the shared store.
 */
import cron from 'node-cron';
import { PIPELINE, env } from './config.js';
import { createContext, pipelineDeps, type AppContext } from './context.js';
import { isStoreConfigured, pendingSyncCount, syncPendingToSupabase } from './db/client.js';
import { errorMessage } from './errors.js';
import { telegram } from './monitoring/telegram.js';
import { runPipeline, type PipelineResult } from './pipeline/index.js';
import { logger } from './utils/logger.js';

function articlesFile(arg: string | undefined): string {
  const file = arg ?? env.ARTICLES_FILE;
  if (!file) throw new Error('No articles file: pass one to `run` or set ARTICLES_FILE');
  return file;
}

function requireJobId(id: string | undefined, command: string): string {
  if (!id) throw new Error(`Usage: ${command} <jobId>`);
  return id;
}

function requireSharedStore(command: string): void {
  if (!isStoreConfigured()) {
    throw new Error(`${command} needs SUPABASE_URL and SUPABASE_SERVICE_KEY: without a shared store jobs live only inside the process running them`);
  }
}

let running = false;

/** One run at a time per process; a cron tick during a run is skipped. */
async function runOnce(ctx: AppContext, file: string): Promise<PipelineResult | null> {
  if (running) {
    logger.warn('Pipeline already running — skipping this trigger');
    return null;
  }
  running = true;
  try {
    return await runPipeline(pipelineDeps(ctx, file));
  } finally {
    running = false;
  }
}

// ── Cron schedules ────────────────────────────────────────────────────────────

function startCron(ctx: AppContext): void {
  cron.schedule(env.PIPELINE_CRON, async () => {
    logger.info('Cron: triggering pipeline');
    try {
      await runOnce(ctx, articlesFile(undefined));
    } catch (err) {
      logger.error('Cron: pipeline error', { error: errorMessage(err) });
      await telegram.error(`Pipeline cron error: ${errorMessage(err)}`);
    }
  });

  cron.schedule(env.EVICTION_CRON, async () => {
    logger.info('Cron: triggering cache eviction');
    try {
      await ctx.cache.evictExpired();
      if (isStoreConfigured() && (await pendingSyncCount()) > 0) await syncPendingToSupabase();
    } catch (err) {
      logger.error('Cron: maintenance error', { error: errorMessage(err) });
    }
  });

  logger.info('Cron: schedules registered', { pipeline: env.PIPELINE_CRON, eviction: env.EVICTION_CRON });
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, arg] = process.argv;

async function main(): Promise<void> {
  logger.info('newsreel: starting', { command: command ?? 'server', preset: PIPELINE.preset });

  switch (command) {
    case 'run': {
      const ctx = await createContext();
      const result = await runOnce(ctx, articlesFile(arg));
      if (result) {
        console.log(JSON.stringify({ jobId: result.job.id, status: result.job.status, outputPath: result.outputPath }, null, 2));
        if (result.job.status !== 'completed') process.exitCode = 1;
      }
      break;
    }

    case 'status': {
      const id = requireJobId(arg, 'status');
      requireSharedStore('status');
      const job = await (await createContext()).ledger.get(id);
      if (!job) throw new Error(`No job ${id}`);
      console.log(JSON.stringify(job, null, 2));
      break;
    }

    case 'pause':
    case 'resume': {
      const id = requireJobId(arg, command);
      requireSharedStore(command);
      const { ledger } = await createContext();
      const job = command === 'pause' ? await ledger.pause(id) : await ledger.resume(id);
      console.log(`Job ${job.id} is now ${job.status}`);
      break;
    }

    case 'evict': {
      const removed = await (await createContext()).cache.evictExpired();
      console.log(`Evicted ${removed} expired cache entr${removed === 1 ? 'y' : 'ies'}`);
      break;
    }

    case 'sync': {
      requireSharedStore('sync');
      const synced = await syncPendingToSupabase();
      console.log(`Replayed ${synced} queued write(s); ${await pendingSyncCount()} still pending`);
      break;
    }

    case undefined:
    case 'server': {
      const ctx = await createContext();
      startCron(ctx);
      await telegram.info('newsreel server started.');
      logger.info('newsreel: server mode running');
      break;
    }

    default:
      logger.error(`Unknown command: ${command}. Use: run [articlesFile] | status <jobId> | pause <jobId> | resume <jobId> | evict | sync | server`);
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  logger.error('Fatal', { error: errorMessage(err) });
  process.exit(1);
});
