import { describe, expect, it } from 'vitest';
import { chunkScript } from './narration.js';

describe('chunkScript', () => {
  it('packs whole paragraphs up to the limit', () => {
    expect(chunkScript('One.\n\nTwo.\n\n\nThree.', 10)).toEqual(['One.\n\nTwo.', 'Three.']);
  });

  it('collapses whitespace inside a paragraph', () => {
    expect(chunkScript('Line one\ncontinues   here.')).toEqual(['Line one continues here.']);
  });

  it('splits an oversized paragraph at sentence ends', () => {
    expect(chunkScript('Alpha beta. Gamma delta. Epsilon.', 15)).toEqual(['Alpha beta.', 'Gamma delta.', 'Epsilon.']);
  });

  it('returns nothing for a blank script', () => {
    expect(chunkScript(' \n\n ')).toEqual([]);
  });
});
