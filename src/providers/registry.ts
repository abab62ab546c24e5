/**
 * Builds the ordered provider list for each request type from the static
 * preference lists. Providers whose credential is missing are left out;
 * names that do not serve a request type are dropped with a warning.
 */
import { PRIORITIES, env, providerCredential, type ProviderName, type RequestType } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { GiphyMediaProvider } from './media/giphy.js';
import { NasaMediaProvider } from './media/nasa.js';
import { PexelsMediaProvider } from './media/pexels.js';
import { PixabayMediaProvider } from './media/pixabay.js';
import { UnsplashMediaProvider } from './media/unsplash.js';
import { AnthropicScriptProvider } from './script/anthropic.js';
import { OpenAIScriptProvider } from './script/openai.js';
import { TemplateScriptProvider } from './script/template.js';
import { OpenAITranscriptionProvider } from './transcription/openai.js';
import { WhisperCliTranscriptionProvider } from './transcription/whisper-cli.js';
import type { MediaProvider, ScriptProvider, TranscriptionProvider } from './types.js';

const log = createLogger('registry');

type Factory<P> = (credential: string) => P;
type Factories<P> = Partial<Record<ProviderName, Factory<P>>>;

const IMAGE: Factories<MediaProvider> = {
  nasa:     () => new NasaMediaProvider(),
  pixabay:  (key) => new PixabayMediaProvider(key),
  pexels:   (key) => new PexelsMediaProvider(key),
  unsplash: (key) => new UnsplashMediaProvider(key),
};

const VIDEO: Factories<MediaProvider> = {
  ...IMAGE,
  giphy: (key) => new GiphyMediaProvider(key),
};

const SCRIPT: Factories<ScriptProvider> = {
  openai:    (key) => new OpenAIScriptProvider(key, env.OPENAI_SCRIPT_MODEL),
  anthropic: (key) => new AnthropicScriptProvider(key, env.ANTHROPIC_SCRIPT_MODEL),
  template:  () => new TemplateScriptProvider(),
};

const TRANSCRIPT: Factories<TranscriptionProvider> = {
  openai:      (key) => new OpenAITranscriptionProvider(key),
  whisper_cli: () => new WhisperCliTranscriptionProvider(),
};

export interface ProviderRegistry {
  media_image: MediaProvider[];
  media_video: MediaProvider[];
  script:      ScriptProvider[];
  transcript:  TranscriptionProvider[];
}

export type CredentialLookup = (name: ProviderName) => string | null;

function build<P>(
  requestType: RequestType,
  order: readonly ProviderName[],
  factories: Factories<P>,
  credential: CredentialLookup,
): P[] {
  const out: P[] = [];
  for (const name of order) {
    const factory = factories[name];
    if (!factory) {
      log.warn(`Provider ${name} does not serve ${requestType} — ignored`);
      continue;
    }
    const key = credential(name);
    if (key === null) {
      log.info(`Provider ${name} has no credential — left out of ${requestType}`);
      continue;
    }
    out.push(factory(key));
  }
  return out;
}

export function buildRegistry(
  priorities: Record<RequestType, readonly ProviderName[]> = PRIORITIES,
  credential: CredentialLookup = providerCredential,
): ProviderRegistry {
  return {
    media_image: build('media_image', priorities.media_image, IMAGE, credential),
    media_video: build('media_video', priorities.media_video, VIDEO, credential),
    script:      build('script', priorities.script, SCRIPT, credential),
    transcript:  build('transcript', priorities.transcript, TRANSCRIPT, credential),
  };
}
