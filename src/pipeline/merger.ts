/**
 * Reel merge: concatenates composed scenes into the final vertical reel.
 *
 * Every clip is scaled to fit 1080×1920, padded to exactly that frame and
 * re-encoded to one profile, so scenes of mixed geometry and codec can be
 * joined. A merge failure is final: there is no fallback output.
 */
import * as fs from 'fs';
import * as path from 'path';
import { FILE_NAMES, REEL, REEL_ENCODE } from '../config.js';
import { logger } from '../utils/logger.js';
import { excerpt, isUsableFile, runFfmpeg } from '../media/ffmpeg.js';
import { probeDuration, type Prober } from '../media/probe.js';
import type { MergeOutcome } from '../types.js';

const log = logger.scope('Merger');

export interface MergeOptions {
  finalDir: string;
  probe?: Prober;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** concat demuxer line, with single quotes escaped for its quoting rules */
export function manifestLine(filePath: string): string {
  const abs = path.resolve(filePath);
  return `file '${abs.replace(/'/g, "'\\''")}'\n`;
}

export function writeConcatManifest(clipPaths: readonly string[], manifestPath: string): void {
  fs.writeFileSync(manifestPath, clipPaths.map(manifestLine).join(''), 'utf-8');
}

export function reelVideoFilter(width: number = REEL.width, height: number = REEL.height): string {
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
    'setsar=1',
  ].join(',');
}

export function buildMergeArgs(manifestPath: string, outputPath: string): string[] {
  return [
    '-f', 'concat', '-safe', '0',
    '-i', manifestPath,
    '-vf', reelVideoFilter(),
    '-c:v', REEL_ENCODE.videoCodec, '-preset', REEL_ENCODE.preset, '-crf', String(REEL_ENCODE.crf),
    '-c:a', REEL_ENCODE.audioCodec, '-b:a', REEL_ENCODE.audioBitrate,
    '-movflags', '+faststart',
    outputPath,
  ];
}

export function isWithinTarget(seconds: number): boolean {
  return seconds >= REEL.targetMinSeconds && seconds <= REEL.targetMaxSeconds;
}

// ── Public API ────────────────────────────────────────────────────────────────

export async function mergeReel(
  composedPaths: ReadonlyArray<string | null | undefined>,
  options: MergeOptions,
): Promise<MergeOutcome> {
  const { finalDir, probe = probeDuration } = options;

  const valid = composedPaths.filter(isUsableFile);
  if (valid.length === 0) {
    log.error('no valid composed scenes to merge', { received: composedPaths.length });
    return { ok: false, reason: 'no_valid_scenes' };
  }

  fs.mkdirSync(finalDir, { recursive: true });
  const manifestPath = path.join(finalDir, FILE_NAMES.concatList);
  const outputPath = path.join(finalDir, FILE_NAMES.finalReel);
  writeConcatManifest(valid, manifestPath);

  log.info('merging scenes into final reel', { count: valid.length, outputPath });
  const res = runFfmpeg(buildMergeArgs(manifestPath, outputPath), 'merge');

  if (!res.ok) {
    const detail = excerpt(res.stderr, REEL_ENCODE.errorExcerpt);
    log.error('merge encode failed', { status: res.status, stderr: detail });
    return { ok: false, reason: 'encode_failed', detail };
  }

  const duration = await probe(outputPath);
  const withinTarget = duration.ok && isWithinTarget(duration.seconds);
  log.info('final reel created', {
    outputPath,
    durationSeconds: Number(duration.seconds.toFixed(1)),
    measured: duration.ok,
  });
  if (!withinTarget) {
    log.warn('reel duration outside target band', {
      durationSeconds: duration.seconds,
      targetMin: REEL.targetMinSeconds,
      targetMax: REEL.targetMaxSeconds,
    });
  }

  return { ok: true, outputPath, sceneCount: valid.length, duration, withinTarget };
}
