import { createReadStream } from 'node:fs';
import { PROVIDER_SETTINGS } from '../../config.js';
import { PermanentProviderError } from '../../errors.js';
import { openaiClient, openaiError } from '../openai-client.js';
import { WhisperOutputSchema, toTranscript } from './schema.js';
import type { Transcript, TranscriptionProvider, TranscriptionRequest } from '../types.js';

/** Hosted Whisper. The API has a single model; `modelSize` only scopes the cache key. */
export class OpenAITranscriptionProvider implements TranscriptionProvider {
  readonly name = 'openai';
  readonly settings = PROVIDER_SETTINGS.openai;

  constructor(private readonly apiKey: string) {}

  async searchOrGenerate(req: TranscriptionRequest, signal: AbortSignal): Promise<Transcript | null> {
    let raw: unknown;
    try {
      raw = await openaiClient(this.apiKey).audio.transcriptions.create(
        {
          file: createReadStream(req.audioPath),
          model: 'whisper-1',
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
        },
        { signal },
      );
    } catch (err) {
      throw openaiError(err);
    }
    const parsed = WhisperOutputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PermanentProviderError(`openai returned an unexpected transcription: ${parsed.error.message}`, this.name);
    }
    const transcript = toTranscript(parsed.data);
    return transcript.segments.length > 0 ? transcript : null;
  }
}
