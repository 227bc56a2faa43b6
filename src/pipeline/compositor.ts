/**
 * Scene composition: lays a scene's scheduled dialogue over its video.
 *
 * The video stream is kept as-is; each line is delayed to its start offset and
 * the delayed streams are amixed into a single track. A scene whose mix fails
 * to encode degrades to silent video rather than disappearing from the reel.
 */
import * as fs from 'fs';
import * as path from 'path';
import { SCENE_ENCODE } from '../config.js';
import { logger } from '../utils/logger.js';
import { excerpt, fileExists, isUsableFile, runFfmpeg } from '../media/ffmpeg.js';
import { probeDuration, type Prober } from '../media/probe.js';
import { scheduledSpan } from './timeline.js';
import type { ScheduledClip, SceneOutcome } from '../types.js';

const log = logger.scope('Compositor');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AudioMix {
  /** Audio inputs in ffmpeg input order, starting at input index 1 */
  inputs: string[];
  filterComplex: string;
  outputLabel: string;
}

export interface ComposeOptions {
  composedDir: string;
  probe?: Prober;
}

// ── Graph building ────────────────────────────────────────────────────────────

export function composedPathFor(composedDir: string, sceneId: number): string {
  return path.join(composedDir, `scene_${sceneId}_composed.mp4`);
}

/** Offset in whole milliseconds; truncated, never rounded. */
export function delayMs(startOffset: number): number {
  return Math.trunc(startOffset * 1000);
}

/**
 * Build the adelay + amix graph for the given clips. Input 0 is reserved for
 * the video, so the k-th clip is input k+1.
 */
export function buildAudioMix(clips: readonly ScheduledClip[]): AudioMix | null {
  if (clips.length === 0) return null;

  const filters = clips.map((clip, k) => {
    const ms = delayMs(clip.startOffset);
    return `[${k + 1}:a]adelay=${ms}|${ms}[a${k}]`;
  });
  const labels = clips.map((_, k) => `[a${k}]`).join('');
  filters.push(`${labels}amix=inputs=${clips.length}:duration=longest[aout]`);

  return {
    inputs: clips.map(c => c.path),
    filterComplex: filters.join(';'),
    outputLabel: '[aout]',
  };
}

export function buildPassthroughArgs(videoPath: string, outputPath: string): string[] {
  return ['-i', videoPath, '-c:v', 'copy', '-an', outputPath];
}

export function buildMixArgs(videoPath: string, mix: AudioMix, outputPath: string): string[] {
  return [
    '-i', videoPath,
    ...mix.inputs.flatMap(p => ['-i', p]),
    '-filter_complex', mix.filterComplex,
    '-map', '0:v',
    '-map', mix.outputLabel,
    '-c:v', SCENE_ENCODE.videoCodec, '-preset', SCENE_ENCODE.preset,
    '-c:a', SCENE_ENCODE.audioCodec, '-b:a', SCENE_ENCODE.audioBitrate,
    '-shortest',
    outputPath,
  ];
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function passthrough(sceneId: number, videoPath: string, outputPath: string): void {
  const res = runFfmpeg(buildPassthroughArgs(videoPath, outputPath), `passthrough:${sceneId}`);
  if (!res.ok) {
    // A partial or leftover file here would be merged as if it were this scene
    fs.rmSync(outputPath, { force: true });
    log.error('video-only passthrough failed', {
      sceneId,
      status: res.status,
      stderr: excerpt(res.stderr, SCENE_ENCODE.errorExcerpt),
    });
  }
}

async function measureOverrun(
  sceneId: number,
  videoPath: string,
  clips: readonly ScheduledClip[],
  probe: Prober,
): Promise<number | undefined> {
  const video = await probe(videoPath);
  if (!video.ok) return undefined;
  const overrun = scheduledSpan(clips) - video.seconds;
  if (overrun <= 0) return undefined;
  log.warn('dialogue runs past end of video: mix will be trimmed', {
    sceneId,
    videoSeconds: video.seconds,
    overrunSeconds: Number(overrun.toFixed(3)),
  });
  return overrun;
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Compose one scene.
 *
 * Returns `dropped` only when the video itself is missing. Once the video is
 * present a `composed` outcome is always returned: mixed when the encode
 * succeeds, otherwise video-only.
 */
export async function composeScene(
  sceneId: number,
  videoPath: string | null,
  scheduled: readonly ScheduledClip[],
  options: ComposeOptions,
): Promise<SceneOutcome> {
  const { composedDir, probe = probeDuration } = options;

  if (!isUsableFile(videoPath)) {
    log.warn('video not found: dropping scene', { sceneId, videoPath });
    return { status: 'dropped', sceneId, reason: 'missing_video' };
  }

  fs.mkdirSync(composedDir, { recursive: true });
  const outputPath = composedPathFor(composedDir, sceneId);
  fs.rmSync(outputPath, { force: true });

  // Re-check: files may have moved since scheduling
  const clips = scheduled.filter(c => fileExists(c.path));
  const mix = buildAudioMix(clips);

  if (!mix) {
    log.info('no usable dialogue: copying video without audio', { sceneId });
    passthrough(sceneId, videoPath, outputPath);
    return { status: 'composed', sceneId, outputPath, mode: 'video_only', clipCount: 0 };
  }

  const dialogueOverrun = await measureOverrun(sceneId, videoPath, clips, probe);

  log.info('composing scene', { sceneId, clips: clips.length });
  const res = runFfmpeg(buildMixArgs(videoPath, mix, outputPath), `compose:${sceneId}`);

  if (!res.ok) {
    const fallbackReason = excerpt(res.stderr, SCENE_ENCODE.errorExcerpt);
    log.warn('mix encode failed: falling back to silent video', {
      sceneId,
      status: res.status,
      stderr: fallbackReason,
    });
    passthrough(sceneId, videoPath, outputPath);
    return {
      status: 'composed',
      sceneId,
      outputPath,
      mode: 'silent_fallback',
      clipCount: 0,
      fallbackReason,
      dialogueOverrun,
    };
  }

  return {
    status: 'composed',
    sceneId,
    outputPath,
    mode: 'mixed',
    clipCount: clips.length,
    dialogueOverrun,
  };
}
