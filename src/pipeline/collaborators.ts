/**
 * Interfaces to the collaborators outside the resilience core: where
 * articles come from, how narration is voiced and how segments are rendered.
 * Default implementations live in src/pipeline/articles.ts and src/media/.
 */
import type { RenderPreset } from '../config.js';
import type { MediaType } from '../providers/types.js';

export interface Article {
  title: string;
  summary: string;
  link?: string;
}

export interface ArticleSource {
  fetch(limit: number): Promise<Article[]>;
}

export interface NarrationSynthesizer {
  /** Writes narration audio for `script` to `outputPath` and returns the path. */
  synthesize(script: string, outputPath: string): Promise<string>;
}

export interface RenderSegment {
  index: number;
  text: string;
  startSec: number;
  durationSec: number;
  visualPath: string;
  mediaType: MediaType;
  /** Visual is the configured fallback image, not a match for the text. */
  degraded: boolean;
}

export interface RenderEngine {
  renderSegment(segment: RenderSegment, outputDir: string, preset: RenderPreset): Promise<string>;
  assemble(clipPaths: readonly string[], narrationPath: string, outputPath: string, preset: RenderPreset): Promise<string>;
}
