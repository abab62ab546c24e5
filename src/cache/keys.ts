/**
 * Deterministic cache keys. Each key hashes exactly the inputs that decide
 * the artifact, so identical work always lands on the same entry.
 */
import { hashString, normalizeQuery } from '../utils/hash.js';

export interface ArticleLike {
  title: string;
  summary: string;
}

export function mediaKey(query: string, provider: string): string {
  return hashString(`media\u0000${normalizeQuery(query)}\u0000${provider}`);
}

export function transcriptKey(audioHash: string, modelSize: string): string {
  return hashString(`transcript\u0000${audioHash}\u0000${modelSize}`);
}

/** Order-sensitive: the script narrates articles in the order given. */
export function scriptKey(articles: readonly ArticleLike[]): string {
  const body = articles.map((a) => `${a.title.trim()}\u0001${a.summary.trim()}`).join('\u0000');
  return hashString(`script\u0000${body}`);
}
