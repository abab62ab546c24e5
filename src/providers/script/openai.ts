import { PROVIDER_SETTINGS } from '../../config.js';
import { PermanentProviderError } from '../../errors.js';
import { openaiClient, openaiError } from '../openai-client.js';
import { SYSTEM_PROMPT, buildPrompt } from './prompt.js';
import type { ScriptDraft, ScriptProvider, ScriptRequest } from '../types.js';

export class OpenAIScriptProvider implements ScriptProvider {
  readonly name = 'openai';
  readonly settings = PROVIDER_SETTINGS.openai;

  constructor(private readonly apiKey: string, private readonly model: string) {}

  async searchOrGenerate(req: ScriptRequest, signal: AbortSignal): Promise<ScriptDraft | null> {
    if (req.articles.length === 0) return null;
    let content: string | null | undefined;
    try {
      const res = await openaiClient(this.apiKey).chat.completions.create(
        {
          model: this.model,
          max_tokens: Math.ceil(req.targetWords * 2),
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildPrompt(req) },
          ],
        },
        { signal },
      );
      content = res.choices[0]?.message?.content;
    } catch (err) {
      throw openaiError(err);
    }
    const text = content?.trim() ?? '';
    if (!text) throw new PermanentProviderError('openai returned an empty script', this.name);
    return { text, model: this.model };
  }
}
