import type { Article } from '../../pipeline/collaborators.js';
import type { ScriptRequest } from '../types.js';

export const SYSTEM_PROMPT = 'You are a science journalist writing narration for a short news video. ' +
  'Write plain spoken prose in short paragraphs. No headings, stage directions or markdown.';

export const articleLine = (a: Article) => `${a.title.trim()} - ${a.summary.trim()}`;

export function buildPrompt(req: ScriptRequest): string {
  const stories = req.articles.map((a, i) => `${i + 1}. ${articleLine(a)}`).join('\n');
  return `Turn these news stories into an engaging video script of about ${req.targetWords} words:\n${stories}`;
}
