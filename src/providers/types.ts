import type { ProviderName, ProviderSettings } from '../config.js';
import type { Article } from '../pipeline/collaborators.js';

/**
 * Uniform capability every external provider exposes to the router.
 * `null` means the provider answered but has nothing for this request.
 * Failures are thrown as TransientProviderError / PermanentProviderError.
 */
export interface ArtifactProvider<Req, Art> {
  readonly name: ProviderName;
  readonly settings: ProviderSettings;
  searchOrGenerate(request: Req, signal: AbortSignal): Promise<Art | null>;
}

// ── Media ─────────────────────────────────────────────────────────────────────

export type MediaType = 'image' | 'video' | 'gif';

export interface MediaRequest {
  query: string;
  preferVideo: boolean;
}

export interface MediaCandidate {
  url: string;
  mediaType: MediaType;
  resolution?: string;
  /** Extension the downloaded file should carry, including the dot. */
  ext: string;
}

export type MediaProvider = ArtifactProvider<MediaRequest, MediaCandidate>;

// ── Script ────────────────────────────────────────────────────────────────────

export interface ScriptRequest {
  articles: readonly Article[];
  targetWords: number;
}

export interface ScriptDraft {
  text: string;
  model: string;
}

export type ScriptProvider = ArtifactProvider<ScriptRequest, ScriptDraft>;

// ── Transcription ─────────────────────────────────────────────────────────────

export interface TranscriptionRequest {
  audioPath: string;
  modelSize: string;
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface Transcript {
  segments: TranscriptSegment[];
  durationSec: number;
}

export type TranscriptionProvider = ArtifactProvider<TranscriptionRequest, Transcript>;
