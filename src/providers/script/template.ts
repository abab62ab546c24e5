import { PROVIDER_SETTINGS } from '../../config.js';
import { articleLine } from './prompt.js';
import type { ScriptDraft, ScriptProvider, ScriptRequest } from '../types.js';

/** Last resort: stitches the headlines together. Deterministic and offline. */
export class TemplateScriptProvider implements ScriptProvider {
  readonly name = 'template';
  readonly settings = PROVIDER_SETTINGS.template;

  async searchOrGenerate(req: ScriptRequest): Promise<ScriptDraft | null> {
    if (req.articles.length === 0) return null;
    const stories = req.articles.map((a, i) => `Story ${i + 1}: ${articleLine(a)}`);
    const text = ['Welcome to the news roundup!', ...stories, "That's all for now. Thanks for watching!"].join('\n\n');
    return { text, model: 'template' };
  }
}
