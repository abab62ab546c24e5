import { z } from 'zod';
import type { Transcript } from '../types.js';

/** Segment list shared by the Whisper API's verbose_json and the CLI's json output. */
export const WhisperOutputSchema = z.object({
  duration: z.number().optional(),
  segments: z.array(z.object({ start: z.number(), end: z.number(), text: z.string() })),
});

export function toTranscript(out: z.infer<typeof WhisperOutputSchema>): Transcript {
  const segments = out.segments
    .map((s) => ({ start: s.start, end: s.end, text: s.text.trim() }))
    .filter((s) => s.text.length > 0);
  const durationSec = out.duration ?? segments.at(-1)?.end ?? 0;
  return { segments, durationSec };
}
