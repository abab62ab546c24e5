import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Providers ─────────────────────────────────────────────────────────────────

export const PROVIDER_NAMES = [
  'nasa',
  'pixabay',
  'pexels',
  'unsplash',
  'giphy',
  'openai',
  'anthropic',
  'template',
  'whisper_cli',
] as const;

export type ProviderName = typeof PROVIDER_NAMES[number];

export const ProviderNameSchema = z.enum(PROVIDER_NAMES);

const priorityList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((raw) => raw.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(ProviderNameSchema).min(1));

// ── Render presets ────────────────────────────────────────────────────────────

export const PRESET_NAMES = ['ultra_fast', 'fast', 'balanced', 'hq', 'production'] as const;

export type PresetName = typeof PRESET_NAMES[number];

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Generative text / transcription / narration
  OPENAI_API_KEY:                z.string().min(1).optional(),
  ANTHROPIC_API_KEY:             z.string().min(1).optional(),
  OPENAI_SCRIPT_MODEL:           z.string().default('gpt-4o-mini'),
  ANTHROPIC_SCRIPT_MODEL:        z.string().default('claude-3-5-haiku-latest'),
  OPENAI_TTS_VOICE:              z.enum(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']).default('onyx'),

  // Stock media
  PEXELS_API_KEY:                z.string().min(1).optional(),
  PIXABAY_API_KEY:               z.string().min(1).optional(),
  UNSPLASH_ACCESS_KEY:           z.string().min(1).optional(),
  GIPHY_API_KEY:                 z.string().min(1).optional(),

  // Database (optional: in-process repositories when unset)
  SUPABASE_URL:                  z.string().url().optional(),
  SUPABASE_SERVICE_KEY:          z.string().min(1).optional(),
  FALLBACK_DB_PATH:              z.string().default(`${process.env['HOME'] ?? '/tmp'}/newsreel/local_fallback.db`),
  STORE_WRITE_ATTEMPTS:          z.coerce.number().int().min(1).default(3),

  // Notifications (optional)
  TELEGRAM_BOT_TOKEN:            z.string().min(1).optional(),
  TELEGRAM_CHAT_ID:              z.string().min(1).optional(),

  // Cache
  CACHE_DIR:                     z.string().default('./cache'),
  CACHE_TTL_DAYS:                z.coerce.number().positive().default(30),

  // Resilience
  CIRCUIT_FAILURE_THRESHOLD:     z.coerce.number().int().min(1).default(5),
  CIRCUIT_COOLDOWN_MS:           z.coerce.number().int().min(0).default(60_000),
  HEALTH_WINDOW_MINUTES:         z.coerce.number().positive().default(60),
  HEALTH_NEUTRAL_SCORE:          z.coerce.number().min(0).max(1).default(0.5),
  HEALTH_MIN_SCORE:              z.coerce.number().min(0).max(1).default(0),
  RETRY_MAX_ATTEMPTS:            z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS:           z.coerce.number().int().min(0).default(1_000),
  RETRY_MAX_DELAY_MS:            z.coerce.number().int().min(0).default(15_000),
  PROVIDER_TIMEOUT_MS:           z.coerce.number().int().positive().default(60_000),
  GENERATION_TIMEOUT_MS:         z.coerce.number().int().positive().default(120_000),

  // Provider preference lists
  MEDIA_IMAGE_PRIORITY:          priorityList('nasa,pixabay,pexels,unsplash'),
  MEDIA_VIDEO_PRIORITY:          priorityList('pixabay,nasa,pexels,giphy'),
  SCRIPT_PRIORITY:               priorityList('openai,anthropic,template'),
  TRANSCRIPT_PRIORITY:           priorityList('openai,whisper_cli'),

  // Resource governor
  WORKERS_FLOOR:                 z.coerce.number().int().min(1).default(1),
  MEMORY_PER_WORKER_MB:          z.coerce.number().positive().default(512),
  DISK_PER_WORKER_MB:            z.coerce.number().positive().default(200),
  DISK_SAFETY_MARGIN_GB:         z.coerce.number().min(0).default(5),
  SEGMENT_OUTPUT_MB:             z.coerce.number().min(0).default(50),

  // Pipeline
  PIPELINE_PRESET:               z.enum(PRESET_NAMES).default('balanced'),
  OUTPUT_DIR:                    z.string().default('./output'),
  ARTICLES_FILE:                 z.string().optional(),
  FALLBACK_IMAGE_PATH:           z.string().optional(),
  MIN_SEGMENTS:                  z.coerce.number().int().min(0).default(1),
  TRANSCRIPTION_MODEL:           z.enum(['tiny', 'base', 'small', 'medium', 'large']).default('small'),
  VIDEO_SEGMENT_THRESHOLD_SEC:   z.coerce.number().positive().default(15),
  SCRIPT_TARGET_WORDS:           z.coerce.number().int().positive().default(1_300),
  PAUSE_POLL_MS:                 z.coerce.number().int().positive().default(5_000),
  PIPELINE_CRON:                 z.string().default('0 */6 * * *'),
  EVICTION_CRON:                 z.string().default('30 3 * * *'),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

export type Env = typeof env;

// ── Render presets ────────────────────────────────────────────────────────────

export interface RenderPreset {
  resolution: `${number}x${number}`;
  encoderPreset: string;
  crf: number;
  maxWorkers: number;
  articlesPerFeed: number;
  enableTranscriptCache: boolean;
  enableMediaCache: boolean;
  enableScriptCache: boolean;
}

export const PRESETS: Record<PresetName, RenderPreset> = {
  ultra_fast: {
    resolution: '640x360',   encoderPreset: 'ultrafast', crf: 30, maxWorkers: 8, articlesPerFeed: 1,
    enableTranscriptCache: true, enableMediaCache: true, enableScriptCache: true,
  },
  fast: {
    resolution: '854x480',   encoderPreset: 'veryfast',  crf: 28, maxWorkers: 6, articlesPerFeed: 2,
    enableTranscriptCache: true, enableMediaCache: true, enableScriptCache: true,
  },
  balanced: {
    resolution: '1280x720',  encoderPreset: 'medium',    crf: 23, maxWorkers: 4, articlesPerFeed: 3,
    enableTranscriptCache: true, enableMediaCache: true, enableScriptCache: true,
  },
  hq: {
    resolution: '1920x1080', encoderPreset: 'slow',      crf: 20, maxWorkers: 3, articlesPerFeed: 5,
    enableTranscriptCache: true, enableMediaCache: true, enableScriptCache: true,
  },
  production: {
    resolution: '1920x1080', encoderPreset: 'slower',    crf: 18, maxWorkers: 2, articlesPerFeed: 5,
    enableTranscriptCache: true, enableMediaCache: true, enableScriptCache: true,
  },
};

export function getPreset(name: PresetName, overrides: Partial<RenderPreset> = {}): RenderPreset {
  return { ...PRESETS[name], ...overrides };
}

// ── Cache ─────────────────────────────────────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

export const CACHE = {
  dir:   env.CACHE_DIR,
  ttlMs: env.CACHE_TTL_DAYS * DAY_MS,
} as const;

// ── Resilience ────────────────────────────────────────────────────────────────

export const RESILIENCE = {
  failureThreshold: env.CIRCUIT_FAILURE_THRESHOLD,
  cooldownMs:       env.CIRCUIT_COOLDOWN_MS,
  healthWindowMs:   env.HEALTH_WINDOW_MINUTES * 60_000,
  neutralScore:     env.HEALTH_NEUTRAL_SCORE,
  minHealthScore:   env.HEALTH_MIN_SCORE,
  maxDelayMs:       env.RETRY_MAX_DELAY_MS,
} as const;

export const PRIORITIES = {
  media_image: env.MEDIA_IMAGE_PRIORITY,
  media_video: env.MEDIA_VIDEO_PRIORITY,
  script:      env.SCRIPT_PRIORITY,
  transcript:  env.TRANSCRIPT_PRIORITY,
} as const;

export type RequestType = keyof typeof PRIORITIES;

/**
 * Recognized options per provider. `auth` names the env var holding the
 * credential; `null` means the provider needs none.
 */
export interface ProviderSettings {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  auth: keyof Env | null;
}

// Media attempts cover the search and the download of the chosen file
const searchDefaults = {
  timeoutMs:   env.PROVIDER_TIMEOUT_MS,
  maxAttempts: env.RETRY_MAX_ATTEMPTS,
  baseDelayMs: env.RETRY_BASE_DELAY_MS,
};

const generationDefaults = {
  timeoutMs:   env.GENERATION_TIMEOUT_MS,
  maxAttempts: env.RETRY_MAX_ATTEMPTS,
  baseDelayMs: env.RETRY_BASE_DELAY_MS,
};

export const PROVIDER_SETTINGS: Record<ProviderName, ProviderSettings> = {
  nasa:        { ...searchDefaults,     auth: null },
  pixabay:     { ...searchDefaults,     auth: 'PIXABAY_API_KEY' },
  pexels:      { ...searchDefaults,     auth: 'PEXELS_API_KEY' },
  unsplash:    { ...searchDefaults,     auth: 'UNSPLASH_ACCESS_KEY' },
  giphy:       { ...searchDefaults,     auth: 'GIPHY_API_KEY' },
  openai:      { ...generationDefaults, auth: 'OPENAI_API_KEY' },
  anthropic:   { ...generationDefaults, auth: 'ANTHROPIC_API_KEY' },
  template:    { timeoutMs: 1_000, maxAttempts: 1, baseDelayMs: 0, auth: null },
  whisper_cli: { timeoutMs: 30 * 60_000, maxAttempts: 1, baseDelayMs: 0, auth: null },
};

/**
 * Resolve a provider's credential. Empty string for providers without auth,
 * null when a required credential is missing.
 */
export function providerCredential(name: ProviderName): string | null {
  const ref = PROVIDER_SETTINGS[name].auth;
  if (ref === null) return '';
  const value = env[ref];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

// ── Resource governor ─────────────────────────────────────────────────────────

const MB = 1024 * 1024;
const GB = 1024 * MB;

export const GOVERNOR = {
  floor:                 env.WORKERS_FLOOR,
  memoryPerWorkerBytes:  env.MEMORY_PER_WORKER_MB * MB,
  diskPerWorkerBytes:    env.DISK_PER_WORKER_MB * MB,
  diskSafetyMarginBytes: env.DISK_SAFETY_MARGIN_GB * GB,
  segmentOutputBytes:    env.SEGMENT_OUTPUT_MB * MB,
} as const;

// ── Pipeline ──────────────────────────────────────────────────────────────────

export const PIPELINE = {
  preset:                env.PIPELINE_PRESET,
  outputDir:             env.OUTPUT_DIR,
  fallbackImagePath:     env.FALLBACK_IMAGE_PATH ?? null,
  minSegments:           env.MIN_SEGMENTS,
  transcriptionModel:    env.TRANSCRIPTION_MODEL,
  videoThresholdSec:     env.VIDEO_SEGMENT_THRESHOLD_SEC,
  scriptTargetWords:     env.SCRIPT_TARGET_WORDS,
  pausePollMs:           env.PAUSE_POLL_MS,
} as const;
