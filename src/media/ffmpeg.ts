/**
 * FFmpeg render engine — per-segment clips and final assembly.
 *
 * Commands run through execFile (argument arrays, no shell) so paths never
 * need quoting. All functions throw on non-zero exit.
 */
import { execFile } from 'node:child_process';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { createLogger } from '../utils/logger.js';
import type { RenderPreset } from '../config.js';
import type { RenderEngine, RenderSegment } from '../pipeline/collaborators.js';

const log = createLogger('ffmpeg');
const exec = promisify(execFile);

const FPS = 30;

// ── Helpers ────────────────────────────────────────────────────────────────────

async function runFfmpeg(args: string[], label: string): Promise<void> {
  log.debug(`FFmpeg [${label}]`, { args: args.join(' ') });
  try {
    await exec('ffmpeg', ['-y', '-hide_banner', '-loglevel', 'error', ...args], { maxBuffer: 16 * 1024 * 1024 });
  } catch (err) {
    const stderr = err instanceof Error && 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
    throw new Error(`FFmpeg ${label} failed: ${stderr || String(err)}`, { cause: err });
  }
}

function dimensions(preset: RenderPreset): { width: number; height: number } {
  const [width = 1280, height = 720] = preset.resolution.split('x').map(Number);
  return { width, height };
}

/** Letterbox into the preset frame at a constant frame rate. */
function frameFilter(preset: RenderPreset): string {
  const { width, height } = dimensions(preset);
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
    'setsar=1',
    `fps=${FPS}`,
    'format=yuv420p',
  ].join(',');
}

export const segmentFileName = (index: number) => `segment_${String(index).padStart(4, '0')}.mp4`;

/**
 * Stills are looped for the segment duration; clips and GIFs are looped if
 * short and trimmed to the duration.
 */
export function segmentArgs(segment: RenderSegment, outputPath: string, preset: RenderPreset): string[] {
  const duration = Math.max(0.1, segment.durationSec).toFixed(3);
  const input = segment.mediaType === 'image'
    ? ['-loop', '1', '-i', segment.visualPath]
    : ['-stream_loop', '-1', '-i', segment.visualPath];
  return [
    ...input,
    '-t', duration,
    '-vf', frameFilter(preset),
    '-c:v', 'libx264',
    '-preset', preset.encoderPreset,
    '-crf', String(preset.crf),
    '-an',
    outputPath,
  ];
}

/** Concat-demuxer list; single quotes in paths are escaped the way the demuxer expects. */
export function concatList(clipPaths: readonly string[]): string {
  return clipPaths.map((p) => `file '${path.resolve(p).replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

// ── Engine ─────────────────────────────────────────────────────────────────────

export class FfmpegRenderEngine implements RenderEngine {
  async renderSegment(segment: RenderSegment, outputDir: string, preset: RenderPreset): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const out = path.join(outputDir, segmentFileName(segment.index));
    await runFfmpeg(segmentArgs(segment, out, preset), `segment ${segment.index}`);
    return out;
  }

  async assemble(clipPaths: readonly string[], narrationPath: string, outputPath: string, preset: RenderPreset): Promise<string> {
    if (clipPaths.length === 0) throw new Error('assemble: no clips provided');
    log.info('FFmpeg: assembling video', { clips: clipPaths.length, outputPath, resolution: preset.resolution });

    await mkdir(path.dirname(outputPath), { recursive: true });
    const listPath = `${outputPath}.concat.txt`;
    await writeFile(listPath, concatList(clipPaths), 'utf-8');
    try {
      await runFfmpeg(
        [
          '-f', 'concat', '-safe', '0', '-i', listPath,
          '-i', narrationPath,
          '-map', '0:v', '-map', '1:a',
          '-c:v', 'copy', '-c:a', 'aac', '-b:a', '192k',
          '-shortest',
          outputPath,
        ],
        'assemble',
      );
    } finally {
      await rm(listPath, { force: true });
    }
    log.info('FFmpeg: assembly complete', { outputPath });
    return outputPath;
  }
}
