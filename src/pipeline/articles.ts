import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Article, ArticleSource } from './collaborators.js';

const ArticleSchema = z.object({
  title:   z.string().min(1),
  summary: z.string().default(''),
  link:    z.string().url().optional(),
});

/** Either a bare array or `{ "articles": [...] }`. */
const FileSchema = z.union([
  z.array(ArticleSchema),
  z.object({ articles: z.array(ArticleSchema) }).transform((f) => f.articles),
]);

/** Articles from a JSON file, in file order. */
export class JsonFileArticleSource implements ArticleSource {
  constructor(private readonly filePath: string) {}

  async fetch(limit: number): Promise<Article[]> {
    const raw = await readFile(this.filePath, 'utf8');
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err) {
      throw new Error(`${this.filePath} is not valid JSON`, { cause: err });
    }
    const parsed = FileSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`${this.filePath} is not a list of articles: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
    }
    return parsed.data.slice(0, limit);
  }
}
