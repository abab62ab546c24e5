#!/usr/bin/env tsx
/**
 * Database migration runner.
 * Runs the SQL files in /migrations/ in order, skipping already-applied ones.
 * Run: npm run setup-db
 *
 * Needs an `exec_sql(sql text)` RPC on the Supabase project; without it,
 * apply the files with the Supabase CLI instead.
 *
 * Exit codes:
 *   0 — all migrations applied (or already up-to-date)
 *   1 — one or more migrations failed
 */
import { createClient } from '@supabase/supabase-js';
import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const SUPABASE_URL         = process.env['SUPABASE_URL'];
const SUPABASE_SERVICE_KEY = process.env['SUPABASE_SERVICE_KEY'];

if (!SUPABASE_URL || !SUPABASE_SERVICE_KEY) {
  console.error(`${RED}SUPABASE_URL and SUPABASE_SERVICE_KEY must be set in .env${RESET}`);
  process.exit(1);
}

const sb = createClient(SUPABASE_URL, SUPABASE_SERVICE_KEY, { auth: { persistSession: false } });
const migrationsDir = fileURLToPath(new URL('../migrations', import.meta.url));

// ── Helpers ───────────────────────────────────────────────────────────────────

async function executeSql(sql: string): Promise<void> {
  const { error } = await sb.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

async function getAppliedMigrations(): Promise<Set<string>> {
  const { data, error } = await sb.from('_migrations').select('name');
  if (error) {
    if (error.message.includes('does not exist')) return new Set<string>();
    throw new Error(`Could not query _migrations: ${error.message}`);
  }
  const names = (data ?? []).flatMap((r: { name?: unknown }) => (typeof r.name === 'string' ? [r.name] : []));
  return new Set(names);
}

async function markApplied(name: string): Promise<void> {
  const { error } = await sb.from('_migrations').insert({ name });
  if (error && !error.message.includes('duplicate')) {
    console.warn(`  ${YELLOW}Warning: could not record migration ${name}: ${error.message}${RESET}`);
  }
}

// ── Main ──────────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== newsreel — Database Migration Runner ===${RESET}\n`);

if (!existsSync(migrationsDir)) {
  console.error(`${RED}migrations/ directory not found at ${migrationsDir}${RESET}`);
  process.exit(1);
}

const files = readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();
console.log(`Found ${files.length} migration file(s):\n`);
files.forEach((f) => console.log(`  ${CYAN}${f}${RESET}`));
console.log('');

await executeSql(`
  CREATE TABLE IF NOT EXISTS _migrations (
    id         SERIAL PRIMARY KEY,
    name       TEXT NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`).catch((err: unknown) => {
  console.warn(`${YELLOW}  Could not create _migrations via exec_sql: ${err instanceof Error ? err.message : String(err)}${RESET}`);
});

const applied = await getAppliedMigrations();
let ran = 0;
let skipped = 0;
let failed = 0;

for (const file of files) {
  process.stdout.write(`  ${file.replace('.sql', '')}… `);
  if (applied.has(file)) {
    console.log(`${YELLOW}skipped${RESET}  (already applied)`);
    skipped++;
    continue;
  }
  try {
    await executeSql(readFileSync(join(migrationsDir, file), 'utf-8'));
    await markApplied(file);
    console.log(`${GREEN}✓ applied${RESET}`);
    ran++;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`${RED}✗ FAILED${RESET}\n    Error: ${msg}`);
    if (msg.includes('exec_sql')) {
      console.error(`${YELLOW}  Tip: apply migrations with the Supabase CLI:  npx supabase db push${RESET}`);
    }
    failed++;
  }
}

console.log(`\n${BOLD}Migration summary:${RESET}`);
console.log(`  ${GREEN}Applied:  ${ran}${RESET}`);
console.log(`  ${YELLOW}Skipped:  ${skipped}${RESET}`);
if (failed > 0) {
  console.error(`  ${RED}Failed:   ${failed}${RESET}\n`);
  process.exit(1);
}
console.log(`\n${GREEN}${BOLD}All migrations complete.${RESET}\n`);
