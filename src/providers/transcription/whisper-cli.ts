/**
 * Local Whisper via the `whisper` command-line tool. Slow but needs no key;
 * listed after the hosted API.
 */
import { execFile } from 'node:child_process';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { promisify } from 'node:util';
import { PROVIDER_SETTINGS } from '../../config.js';
import { PermanentProviderError, TransientProviderError, errorMessage } from '../../errors.js';
import { WhisperOutputSchema, toTranscript } from './schema.js';
import type { Transcript, TranscriptionProvider, TranscriptionRequest } from '../types.js';

const run = promisify(execFile);

function cliError(err: unknown): Error {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return new PermanentProviderError('whisper executable not found on PATH', 'whisper_cli', { cause: err });
  }
  if (err instanceof Error && err.name === 'AbortError') {
    return new TransientProviderError('whisper_cli aborted', 'whisper_cli', { cause: err });
  }
  return new PermanentProviderError(`whisper_cli failed: ${errorMessage(err)}`, 'whisper_cli', { cause: err });
}

export class WhisperCliTranscriptionProvider implements TranscriptionProvider {
  readonly name = 'whisper_cli';
  readonly settings = PROVIDER_SETTINGS.whisper_cli;

  constructor(private readonly executable = 'whisper') {}

  async searchOrGenerate(req: TranscriptionRequest, signal: AbortSignal): Promise<Transcript | null> {
    const outDir = await mkdtemp(join(tmpdir(), 'whisper-'));
    try {
      try {
        await run(
          this.executable,
          [req.audioPath, '--model', req.modelSize, '--output_format', 'json', '--output_dir', outDir, '--verbose', 'False'],
          { signal, maxBuffer: 16 * 1024 * 1024 },
        );
      } catch (err) {
        throw cliError(err);
      }
      const file = join(outDir, `${basename(req.audioPath, extname(req.audioPath))}.json`);
      let body: unknown;
      try {
        body = JSON.parse(await readFile(file, 'utf8'));
      } catch (err) {
        throw new PermanentProviderError(`whisper_cli wrote no readable output: ${errorMessage(err)}`, this.name);
      }
      const parsed = WhisperOutputSchema.safeParse(body);
      if (!parsed.success) {
        throw new PermanentProviderError(`whisper_cli output has an unexpected shape: ${parsed.error.message}`, this.name);
      }
      const transcript = toTranscript(parsed.data);
      return transcript.segments.length > 0 ? transcript : null;
    } finally {
      await rm(outDir, { recursive: true, force: true });
    }
  }
}
