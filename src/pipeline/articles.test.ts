import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonFileArticleSource } from './articles.js';

describe('JsonFileArticleSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'articles-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function source(contents: string): Promise<JsonFileArticleSource> {
    const file = path.join(dir, 'articles.json');
    await writeFile(file, contents, 'utf8');
    return new JsonFileArticleSource(file);
  }

  it('reads a wrapped list in file order', async () => {
    const articles = await (await source(JSON.stringify({
      articles: [
        { title: 'Aurora over Texas', summary: 'Lights far south.', link: 'https://news.example.test/aurora' },
        { title: 'Comet brightens' },
      ],
    }))).fetch(5);

    expect(articles).toEqual([
      { title: 'Aurora over Texas', summary: 'Lights far south.', link: 'https://news.example.test/aurora' },
      { title: 'Comet brightens', summary: '' },
    ]);
  });

  it('reads a bare array and applies the limit', async () => {
    const articles = await (await source(JSON.stringify([
      { title: 'First', summary: 'a' },
      { title: 'Second', summary: 'b' },
    ]))).fetch(1);

    expect(articles).toEqual([{ title: 'First', summary: 'a' }]);
  });

  it('rejects a file that is not JSON', async () => {
    await expect((await source('title: nope')).fetch(3)).rejects.toThrow(/is not valid JSON/);
  });

  it('rejects entries without a title', async () => {
    await expect((await source(JSON.stringify([{ summary: 'orphan' }]))).fetch(3)).rejects.toThrow(/is not a list of articles/);
  });
});
