#!/usr/bin/env tsx
/**
 * Operational status: provider health over the trailing window, recent
 * render jobs and queued offline writes.
 * Run: npm run status
 */
import { PROVIDER_NAMES, RESILIENCE } from '../src/config.js';
import { createContext } from '../src/context.js';
import { isStoreConfigured, pendingSyncCount } from '../src/db/client.js';

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

const colorScore = (score: number) =>
  `${score >= 0.8 ? GREEN : score >= 0.5 ? YELLOW : RED}${score.toFixed(2)}${RESET}`;

const colorStatus = (status: string) =>
  `${status === 'completed' ? GREEN : status === 'failed' ? RED : YELLOW}${status}${RESET}`;

if (!isStoreConfigured()) {
  console.error(`${RED}SUPABASE_URL and SUPABASE_SERVICE_KEY must be set: status reads the shared store.${RESET}`);
  process.exit(1);
}

const { health, ledger } = await createContext();

// ── Provider health ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}Provider health${RESET} ${DIM}(last ${Math.round(RESILIENCE.healthWindowMs / 60_000)} min)${RESET}`);
for (const provider of PROVIDER_NAMES) {
  const calls = health.callsFor(provider);
  const failures = calls.filter((c) => !c.succeeded);
  const lastError = failures.at(-1)?.errorDetail;
  console.log(
    `  ${provider.padEnd(12)} ${colorScore(health.healthScore(provider))}  ${DIM}${calls.length} call(s)` +
    `${lastError ? `, last error: ${lastError.slice(0, 60)}` : ''}${RESET}`,
  );
}

// ── Recent jobs ───────────────────────────────────────────────────────────────

console.log(`\n${BOLD}Recent jobs${RESET}`);
const jobs = await ledger.recent(10);
if (jobs.length === 0) console.log(`  ${DIM}none${RESET}`);
for (const job of jobs) {
  const m = job.performanceMetrics;
  console.log(
    `  ${job.id.slice(0, 8)}  ${colorStatus(job.status).padEnd(20)} ${String(job.progressPercent).padStart(3)}%  ` +
    `${job.mode.padEnd(10)} hits ${m['cache_hits'] ?? 0} · calls ${m['api_calls_made'] ?? 0} · errors ${job.errorLog.length}  ` +
    `${DIM}${job.createdAt}${RESET}`,
  );
}

// ── Offline queue ─────────────────────────────────────────────────────────────

const pending = await pendingSyncCount();
console.log(`\n${BOLD}Queued offline writes:${RESET} ${pending === 0 ? `${GREEN}0${RESET}` : `${YELLOW}${pending}${RESET} (npm run sync)`}\n`);
