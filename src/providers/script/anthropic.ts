import Anthropic from '@anthropic-ai/sdk';
import { PROVIDER_SETTINGS } from '../../config.js';
import { PermanentProviderError, TransientProviderError, errorMessage } from '../../errors.js';
import { statusError, transportError } from '../http.js';
import { SYSTEM_PROMPT, buildPrompt } from './prompt.js';
import type { ScriptDraft, ScriptProvider, ScriptRequest } from '../types.js';

function anthropicError(err: unknown): Error {
  if (err instanceof Anthropic.APIConnectionError || err instanceof Anthropic.APIUserAbortError) {
    return new TransientProviderError(`anthropic unreachable: ${errorMessage(err)}`, 'anthropic', { cause: err });
  }
  if (err instanceof Anthropic.APIError && typeof err.status === 'number') {
    return statusError('anthropic', err.status, err.message);
  }
  return transportError('anthropic', err);
}

export class AnthropicScriptProvider implements ScriptProvider {
  readonly name = 'anthropic';
  readonly settings = PROVIDER_SETTINGS.anthropic;
  private readonly client: Anthropic;

  constructor(apiKey: string, private readonly model: string) {
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async searchOrGenerate(req: ScriptRequest, signal: AbortSignal): Promise<ScriptDraft | null> {
    if (req.articles.length === 0) return null;
    let text: string;
    try {
      const res = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: Math.ceil(req.targetWords * 2),
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildPrompt(req) }],
        },
        { signal },
      );
      text = res.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (err) {
      throw anthropicError(err);
    }
    if (!text) throw new PermanentProviderError('anthropic returned an empty script', this.name);
    return { text, model: this.model };
  }
}
