/**
 * HTTP helpers shared by the provider adapters. Maps transport and status
 * failures onto the retry taxonomy: 408/429/5xx and network errors are
 * transient, every other 4xx and any unparseable body is permanent.
 */
import type { z } from 'zod';
import { PermanentProviderError, TransientProviderError, errorMessage, isConnectionError } from '../errors.js';

export function statusError(provider: string, status: number, detail: string): Error {
  const message = `${provider} responded ${status}${detail ? `: ${detail.slice(0, 200)}` : ''}`;
  return status === 408 || status === 429 || status >= 500
    ? new TransientProviderError(message, provider)
    : new PermanentProviderError(message, provider);
}

export function transportError(provider: string, err: unknown): Error {
  if (err instanceof TransientProviderError || err instanceof PermanentProviderError) return err;
  if (err instanceof Error && err.name === 'AbortError') {
    return new TransientProviderError(`${provider} request aborted`, provider, { cause: err });
  }
  if (isConnectionError(err) || err instanceof TypeError) {
    return new TransientProviderError(`${provider} unreachable: ${errorMessage(err)}`, provider, { cause: err });
  }
  return err instanceof Error ? err : new Error(String(err));
}

export async function request(provider: string, url: string, init: RequestInit): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, init);
  } catch (err) {
    throw transportError(provider, err);
  }
  if (!res.ok) {
    const detail = await res.text().catch(() => '');
    throw statusError(provider, res.status, detail);
  }
  return res;
}

export async function getJson<S extends z.ZodTypeAny>(
  provider: string,
  url: string,
  schema: S,
  init: { signal: AbortSignal; headers?: Record<string, string> },
): Promise<z.output<S>> {
  const res = await request(provider, url, { method: 'GET', ...init });
  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') throw transportError(provider, err);
    throw new PermanentProviderError(`${provider} returned a non-JSON body: ${errorMessage(err)}`, provider);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new PermanentProviderError(`${provider} returned an unexpected payload: ${parsed.error.message}`, provider);
  }
  return parsed.data;
}
