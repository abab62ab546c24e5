import { describe, expect, it } from 'vitest';
import { WhisperOutputSchema, toTranscript } from './schema.js';

describe('toTranscript', () => {
  it('trims text and drops empty lines', () => {
    const out = WhisperOutputSchema.parse({
      duration: 12.5,
      segments: [
        { start: 0, end: 4.2, text: ' Lights over Texas. ' },
        { start: 4.2, end: 5, text: '   ' },
        { start: 5, end: 12.5, text: 'A solar storm did it.' },
      ],
    });

    expect(toTranscript(out)).toEqual({
      durationSec: 12.5,
      segments: [
        { start: 0, end: 4.2, text: 'Lights over Texas.' },
        { start: 5, end: 12.5, text: 'A solar storm did it.' },
      ],
    });
  });

  it('takes the duration from the last segment when none is reported', () => {
    const out = WhisperOutputSchema.parse({ segments: [{ start: 0, end: 3.5, text: 'Hello.' }] });

    expect(toTranscript(out).durationSec).toBe(3.5);
  });
});
