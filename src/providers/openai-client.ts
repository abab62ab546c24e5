/**
 * One OpenAI client per key, shared by the script, transcription and
 * narration adapters. SDK retries are off: the RetryPolicy owns retries.
 */
import OpenAI from 'openai';
import { TransientProviderError, errorMessage } from '../errors.js';
import { statusError, transportError } from './http.js';

const clients = new Map<string, OpenAI>();

export function openaiClient(apiKey: string): OpenAI {
  let client = clients.get(apiKey);
  if (!client) {
    client = new OpenAI({ apiKey, maxRetries: 0 });
    clients.set(apiKey, client);
  }
  return client;
}

/** Map SDK failures onto the transient/permanent split. */
export function openaiError(err: unknown): Error {
  if (err instanceof OpenAI.APIConnectionError || err instanceof OpenAI.APIUserAbortError) {
    return new TransientProviderError(`openai unreachable: ${errorMessage(err)}`, 'openai', { cause: err });
  }
  if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
    return statusError('openai', err.status, err.message);
  }
  return transportError('openai', err);
}
