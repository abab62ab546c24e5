import { describe, expect, it } from 'vitest';
import { TemplateScriptProvider } from './template.js';
import { buildPrompt } from './prompt.js';

const articles = [
  { title: 'Aurora seen over Texas ', summary: 'A solar storm pushed the northern lights far south.' },
  { title: 'Comet brightens', summary: ' Observers report a naked-eye comet. ' },
];

describe('TemplateScriptProvider', () => {
  it('stitches the headlines into a fixed script', async () => {
    const draft = await new TemplateScriptProvider().searchOrGenerate({ articles, targetWords: 1_300 });

    expect(draft).toEqual({
      model: 'template',
      text: [
        'Welcome to the news roundup!',
        'Story 1: Aurora seen over Texas - A solar storm pushed the northern lights far south.',
        'Story 2: Comet brightens - Observers report a naked-eye comet.',
        "That's all for now. Thanks for watching!",
      ].join('\n\n'),
    });
  });

  it('has nothing to say without articles', async () => {
    await expect(new TemplateScriptProvider().searchOrGenerate({ articles: [], targetWords: 1_300 })).resolves.toBeNull();
  });
});

describe('buildPrompt', () => {
  it('numbers the stories and states the target length', () => {
    expect(buildPrompt({ articles, targetWords: 900 })).toBe(
      'Turn these news stories into an engaging video script of about 900 words:\n' +
        '1. Aurora seen over Texas - A solar storm pushed the northern lights far south.\n' +
        '2. Comet brightens - Observers report a naked-eye comet.',
    );
  });
});
