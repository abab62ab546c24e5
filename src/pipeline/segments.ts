import type { TranscriptSegment } from '../providers/types.js';

export interface SegmentPlan {
  index: number;
  text: string;
  startSec: number;
  durationSec: number;
  /** Search query for the segment's visual. */
  query: string;
  preferVideo: boolean;
}

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'been', 'but', 'by', 'for', 'from', 'has', 'have',
  'in', 'into', 'is', 'it', 'its', 'of', 'on', 'or', 'our', 'so', 'that', 'the', 'their', 'this',
  'to', 'was', 'we', 'were', 'will', 'with', 'you', 'your',
]);

const MAX_QUERY_WORDS = 6;

/** First few content words of the narration line, lower-cased and de-duplicated. */
export function mediaQuery(text: string): string {
  const words = text.toLowerCase().match(/[\p{L}\p{N}'-]+/gu) ?? [];
  const picked: string[] = [];
  for (const w of words) {
    const word = w.replace(/^['-]+|['-]+$/g, '');
    if (word.length < 3 || STOP_WORDS.has(word) || picked.includes(word)) continue;
    picked.push(word);
    if (picked.length === MAX_QUERY_WORDS) break;
  }
  return picked.length > 0 ? picked.join(' ') : text.trim().toLowerCase();
}

/**
 * One segment per transcript line. Each runs until the next line starts so
 * the clips cover the narration without gaps.
 */
export function planSegments(segments: readonly TranscriptSegment[], videoThresholdSec: number): SegmentPlan[] {
  return segments.map((seg, index) => {
    const end = segments[index + 1]?.start ?? seg.end;
    const durationSec = Math.max(0.1, end - seg.start);
    return {
      index,
      text: seg.text,
      startSec: seg.start,
      durationSec,
      query: mediaQuery(seg.text),
      preferVideo: durationSec > videoThresholdSec,
    };
  });
}
