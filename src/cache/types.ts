import { z } from 'zod';

export const ARTIFACT_KINDS = ['media', 'transcript', 'script'] as const;

export type ArtifactKind = typeof ARTIFACT_KINDS[number];

export const MediaMetadataSchema = z.object({
  query:      z.string(),
  provider:   z.string(),
  mediaType:  z.enum(['image', 'video', 'gif']),
  sourceUrl:  z.string(),
  resolution: z.string().optional(),
  fileSize:   z.number().int().min(0),
  fileHash:   z.string(),
});

export const TranscriptMetadataSchema = z.object({
  model:        z.string(),
  durationSec:  z.number().min(0),
  segmentCount: z.number().int().min(0),
});

export const ScriptMetadataSchema = z.object({
  provider:  z.string(),
  model:     z.string(),
  wordCount: z.number().int().min(0),
});

export type MediaMetadata = z.infer<typeof MediaMetadataSchema>;
export type TranscriptMetadata = z.infer<typeof TranscriptMetadataSchema>;
export type ScriptMetadata = z.infer<typeof ScriptMetadataSchema>;

export interface CacheMetadataByKind {
  media: MediaMetadata;
  transcript: TranscriptMetadata;
  script: ScriptMetadata;
}

export const METADATA_SCHEMAS: { [K in ArtifactKind]: z.ZodType<CacheMetadataByKind[K]> } = {
  media:      MediaMetadataSchema,
  transcript: TranscriptMetadataSchema,
  script:     ScriptMetadataSchema,
};

export interface CacheEntry<K extends ArtifactKind = ArtifactKind> {
  kind: K;
  key: string;
  /** Where the bytes live, never the bytes themselves. */
  payloadRef: string;
  metadata: CacheMetadataByKind[K];
  createdAt: Date;
  lastUsedAt: Date;
  useCount: number;
  expiresAt: Date;
}

/** Storage-level shape, as persisted. Metadata is validated on the way out. */
export interface CacheRow {
  kind: ArtifactKind;
  cacheKey: string;
  payloadRef: string;
  metadata: unknown;
  createdAt: string;
  lastUsedAt: string;
  useCount: number;
  expiresAt: string;
}

export interface CacheRepository {
  find(kind: ArtifactKind, key: string): Promise<CacheRow | null>;
  /** Insert unless a row for (kind, key) exists; either way return the stored row. */
  insertIfAbsent(row: CacheRow): Promise<{ row: CacheRow; inserted: boolean }>;
  /** Overwrite an existing row wholesale (expired-entry refresh only). */
  replace(row: CacheRow): Promise<CacheRow>;
  /** Atomically bump use_count and last_used_at. */
  recordUse(kind: ArtifactKind, key: string, usedAt: string): Promise<CacheRow | null>;
  deleteExpired(now: string): Promise<number>;
}
