#!/usr/bin/env tsx
/**
 * Pre-flight check: environment variables, external binaries, Supabase and Telegram.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, note: string) => console.log(`  ${YELLOW}○${RESET} ${label}  ${note}`);

let anyRequiredFailed = false;

function mask(value: string): string {
  return value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
}

function checkRequired(label: string, hint: string): void {
  const value = process.env[label];
  if (value && value.trim().length > 0) {
    pass(label, mask(value));
  } else {
    fail(label, hint);
    anyRequiredFailed = true;
  }
}

function checkOptional(label: string, without: string): void {
  const value = process.env[label];
  if (value && value.trim().length > 0) pass(label, mask(value));
  else skip(label, `not set — ${without}`);
}

function checkBinary(name: string, args: string[], required: boolean, hint: string): void {
  try {
    const out = execFileSync(name, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(name, out.split('\n')[0]?.slice(0, 60) ?? '');
  } catch {
    if (required) {
      fail(name, hint);
      anyRequiredFailed = true;
    } else {
      skip(name, hint);
    }
  }
}

// ── [1] Schema validation ─────────────────────────────────────────────────────

console.log(`\n${BOLD}=== newsreel — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration schema${RESET}`);

try {
  const { PIPELINE, PRIORITIES } = await import('../src/config.js');
  pass('All variables parse', `preset ${PIPELINE.preset}`);
  for (const [type, order] of Object.entries(PRIORITIES)) pass(`${type} order`, order.join(' → '));
  if (PIPELINE.fallbackImagePath && !existsSync(PIPELINE.fallbackImagePath)) {
    fail('FALLBACK_IMAGE_PATH', `${PIPELINE.fallbackImagePath} does not exist`);
    anyRequiredFailed = true;
  }
} catch (err) {
  fail('Configuration', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── [2] Credentials ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Credentials${RESET}`);
checkRequired('OPENAI_API_KEY', 'Needed for narration; get one from https://platform.openai.com/api-keys');
checkOptional('ANTHROPIC_API_KEY', 'anthropic script provider disabled');
checkOptional('PIXABAY_API_KEY', 'pixabay media provider disabled');
checkOptional('PEXELS_API_KEY', 'pexels media provider disabled');
checkOptional('UNSPLASH_ACCESS_KEY', 'unsplash media provider disabled');
checkOptional('GIPHY_API_KEY', 'giphy media provider disabled');

// ── [3] Binaries ──────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Binaries${RESET}`);
checkBinary('ffmpeg', ['-version'], true, 'Install ffmpeg and put it on PATH');
checkBinary('whisper', ['--help'], false, 'not found — whisper_cli transcription disabled');

// ── [4] Supabase ──────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Supabase${RESET}`);
const url = process.env['SUPABASE_URL'];
const key = process.env['SUPABASE_SERVICE_KEY'];
if (!url || !key) {
  skip('Supabase', 'not configured — cache, jobs and call history stay in memory');
} else {
  const sb = createClient(url, key, { auth: { persistSession: false } });
  for (const table of ['artifact_cache', 'api_tracking', 'render_jobs']) {
    const { error } = await sb.from(table).select('id').limit(1);
    if (error) {
      fail(`table ${table}`, `${error.message} — run npm run setup-db`);
      anyRequiredFailed = true;
    } else {
      pass(`table ${table}`);
    }
  }
}

// ── [5] Telegram ──────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Telegram${RESET}`);
const token = process.env['TELEGRAM_BOT_TOKEN'];
if (!token || !process.env['TELEGRAM_CHAT_ID']) {
  skip('Telegram', 'not configured — alerts go to the log only');
} else {
  try {
    const res = await fetch(`https://api.telegram.org/bot${token}/getMe`, { signal: AbortSignal.timeout(5_000) });
    if (res.ok) pass('Telegram bot reachable');
    else fail('Telegram bot', `getMe returned ${res.status} — check TELEGRAM_BOT_TOKEN`);
  } catch (err) {
    fail('Telegram bot', err instanceof Error ? err.message : String(err));
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

if (anyRequiredFailed) {
  console.error(`\n${RED}${BOLD}Pre-flight failed. Fix the items above and re-run.${RESET}\n`);
  process.exit(1);
}
console.log(`\n${GREEN}${BOLD}All required checks passed.${RESET}\n`);
