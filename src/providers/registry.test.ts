import { describe, expect, it } from 'vitest';
import { buildRegistry, type CredentialLookup } from './registry.js';
import type { ProviderName, RequestType } from '../config.js';

const names = (providers: readonly { name: ProviderName }[]) => providers.map((p) => p.name);

describe('buildRegistry', () => {
  const priorities: Record<RequestType, ProviderName[]> = {
    media_image: ['nasa', 'pexels', 'giphy', 'unsplash'],
    media_video: ['giphy', 'pixabay', 'nasa'],
    script:      ['openai', 'whisper_cli', 'template'],
    transcript:  ['whisper_cli', 'openai'],
  };

  it('keeps the configured order and drops providers without a credential', () => {
    const credential: CredentialLookup = (name) => (name === 'pexels' || name === 'pixabay' ? null : 'test-key');

    const registry = buildRegistry(priorities, credential);

    expect(names(registry.media_image)).toEqual(['nasa', 'unsplash']);
    expect(names(registry.media_video)).toEqual(['giphy', 'nasa']);
    expect(names(registry.script)).toEqual(['openai', 'template']);
    expect(names(registry.transcript)).toEqual(['whisper_cli', 'openai']);
  });

  it('ignores providers that do not serve the request type', () => {
    const registry = buildRegistry(priorities, () => 'test-key');

    expect(names(registry.media_image)).not.toContain('giphy');
    expect(names(registry.script)).not.toContain('whisper_cli');
  });
});
