import { describe, expect, it } from 'vitest';
import { concatList, segmentArgs, segmentFileName } from './ffmpeg.js';
import { getPreset } from '../config.js';
import type { RenderSegment } from '../pipeline/collaborators.js';

const preset = getPreset('balanced');

const segment = (overrides: Partial<RenderSegment> = {}): RenderSegment => ({
  index: 3,
  text: 'Aurora over Texas.',
  startSec: 12,
  durationSec: 4.5,
  visualPath: '/cache/media/aurora.jpg',
  mediaType: 'image',
  degraded: false,
  ...overrides,
});

describe('segmentArgs', () => {
  it('loops a still for the segment duration inside the preset frame', () => {
    expect(segmentArgs(segment(), '/work/segment_0003.mp4', preset)).toEqual([
      '-loop', '1', '-i', '/cache/media/aurora.jpg',
      '-t', '4.500',
      '-vf', 'scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=30,format=yuv420p',
      '-c:v', 'libx264',
      '-preset', 'medium',
      '-crf', '23',
      '-an',
      '/work/segment_0003.mp4',
    ]);
  });

  it('loops clips as a stream and trims them to the duration', () => {
    const args = segmentArgs(segment({ mediaType: 'video', visualPath: '/cache/media/aurora.mp4', durationSec: 20 }), '/work/out.mp4', preset);

    expect(args.slice(0, 6)).toEqual(['-stream_loop', '-1', '-i', '/cache/media/aurora.mp4', '-t', '20.000']);
  });

  it('follows the preset resolution and encoder settings', () => {
    const args = segmentArgs(segment(), '/work/out.mp4', getPreset('ultra_fast'));

    expect(args[args.indexOf('-vf') + 1]).toContain('scale=640:360');
    expect(args[args.indexOf('-preset') + 1]).toBe('ultrafast');
    expect(args[args.indexOf('-crf') + 1]).toBe('30');
  });
});

describe('concatList', () => {
  it('writes one quoted entry per clip and escapes single quotes', () => {
    expect(concatList(['/work/a.mp4', "/work/it's.mp4"])).toBe("file '/work/a.mp4'\nfile '/work/it'\\''s.mp4'\n");
  });
});

describe('segmentFileName', () => {
  it('zero-pads the index so clips sort in order', () => {
    expect(segmentFileName(3)).toBe('segment_0003.mp4');
    expect(segmentFileName(120)).toBe('segment_0120.mp4');
  });
});
