/**
 * Narration via OpenAI text-to-speech. The script is split at paragraph
 * boundaries into chunks under the endpoint's input limit; the MP3 chunks
 * are concatenated in order.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { env } from '../config.js';
import { openaiClient, openaiError } from '../providers/openai-client.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { NarrationSynthesizer } from '../pipeline/collaborators.js';

const log = createLogger('narration');

const MAX_INPUT_CHARS = 4_000;

/** Groups paragraphs into chunks of at most `limit` chars; an oversized paragraph is split at sentence ends. */
export function chunkScript(script: string, limit = MAX_INPUT_CHARS): string[] {
  const pieces = script
    .split(/\n\s*\n/)
    .map((p) => p.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .flatMap((p) => (p.length <= limit ? [p] : splitLong(p, limit)));

  const chunks: string[] = [];
  let current = '';
  for (const piece of pieces) {
    if (current && current.length + 2 + piece.length > limit) {
      chunks.push(current);
      current = '';
    }
    current = current ? `${current}\n\n${piece}` : piece;
  }
  if (current) chunks.push(current);
  return chunks;
}

function splitLong(paragraph: string, limit: number): string[] {
  const out: string[] = [];
  let current = '';
  for (const sentence of paragraph.match(/[^.!?]+[.!?]*\s*/g) ?? [paragraph]) {
    if (current && current.length + sentence.length > limit) {
      out.push(current.trim());
      current = '';
    }
    current += sentence.length > limit ? sentence.slice(0, limit) : sentence;
  }
  if (current.trim()) out.push(current.trim());
  return out;
}

export class OpenAINarrationSynthesizer implements NarrationSynthesizer {
  constructor(
    private readonly apiKey: string,
    private readonly voice = env.OPENAI_TTS_VOICE,
  ) {}

  async synthesize(script: string, outputPath: string): Promise<string> {
    const chunks = chunkScript(script);
    if (chunks.length === 0) throw new Error('Cannot narrate an empty script');
    log.info('Synthesizing narration', { chunks: chunks.length, voice: this.voice });

    const parts: Buffer[] = [];
    for (const [i, input] of chunks.entries()) {
      const audio = await withRetry(
        async (signal) => {
          try {
            const res = await openaiClient(this.apiKey).audio.speech.create(
              { model: 'tts-1', voice: this.voice, input, response_format: 'mp3' },
              { signal },
            );
            return Buffer.from(await res.arrayBuffer());
          } catch (err) {
            throw openaiError(err);
          }
        },
        { maxAttempts: env.RETRY_MAX_ATTEMPTS, baseDelayMs: env.RETRY_BASE_DELAY_MS, attemptTimeoutMs: env.GENERATION_TIMEOUT_MS, label: `tts chunk ${i + 1}` },
      );
      parts.push(audio);
    }

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, Buffer.concat(parts));
    return outputPath;
  }
}
