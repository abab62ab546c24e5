import { describe, expect, it } from 'vitest';
import { mediaQuery, planSegments } from './segments.js';

describe('mediaQuery', () => {
  it('keeps the first six content words', () => {
    expect(mediaQuery('The aurora borealis was seen over Texas tonight, and the aurora lit the sky.'))
      .toBe('aurora borealis seen over texas tonight');
  });

  it('falls back to the whole line when every word is filtered out', () => {
    expect(mediaQuery(' It is so. ')).toBe('it is so.');
  });
});

describe('planSegments', () => {
  const transcript = [
    { start: 0, end: 4.5, text: 'Aurora over Texas.' },
    { start: 5, end: 24, text: 'Solar storms push the lights south.' },
    { start: 25, end: 27, text: 'Goodnight.' },
  ];

  it('runs each segment until the next one starts', () => {
    const plans = planSegments(transcript, 15);

    expect(plans.map((p) => [p.index, p.startSec, p.durationSec])).toEqual([
      [0, 0, 5],
      [1, 5, 20],
      [2, 25, 2],
    ]);
  });

  it('asks for video only for segments longer than the threshold', () => {
    expect(planSegments(transcript, 15).map((p) => p.preferVideo)).toEqual([false, true, false]);
  });

  it('derives a search query from each line', () => {
    expect(planSegments(transcript, 15).map((p) => p.query)).toEqual([
      'aurora over texas',
      'solar storms push lights south',
      'goodnight',
    ]);
  });
});
