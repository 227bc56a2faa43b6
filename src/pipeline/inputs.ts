/**
 * Reads the hand-off files written by the video and TTS stages and turns them
 * into Scene values. Scene ids follow video-list position, starting at 1.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { FILE_NAMES, type ReelDirs } from '../config.js';
import { logger } from '../utils/logger.js';
import type { DialogueClip, Scene } from '../types.js';

const log = logger.scope('Inputs');

export class InputError extends Error {
  constructor(message: string, public readonly file: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'InputError';
  }
}

// ── Schemas ───────────────────────────────────────────────────────────────────

const VideoListSchema = z.array(z.string().nullable());

const AudioFileSchema = z.object({
  path:      z.string().min(1),
  order:     z.number().int().positive(),
  character: z.string().optional(),
  text:      z.string().optional(),
  scene_id:  z.number().int().positive().optional(),
});

const AudioListSchema = z.array(
  z.object({
    scene_id:    z.number().int().positive(),
    // Records are checked one by one so a bad clip costs only that line
    audio_files: z.array(z.unknown()),
  }),
);

// ── Helpers ───────────────────────────────────────────────────────────────────

function readJson<T>(file: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new InputError(`${path.basename(file)} is not valid JSON`, file, err);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new InputError(`${path.basename(file)} failed validation: ${issues}`, file);
  }
  return parsed.data;
}

function validClips(sceneId: number, records: readonly unknown[]): DialogueClip[] {
  const clips: DialogueClip[] = [];
  records.forEach((record, index) => {
    const parsed = AudioFileSchema.safeParse(record);
    if (!parsed.success) {
      log.warn('dropping invalid clip record', {
        sceneId,
        index,
        issues: parsed.error.issues.map(i => `${i.path.join('.') || '(record)'}: ${i.message}`),
      });
      return;
    }
    const { path: clipPath, order, character, text } = parsed.data;
    clips.push({ path: clipPath, order, character, text });
  });
  return clips;
}

/** scene_<n>*.mp4 files in the videos dir, ordered by n. */
export function discoverSceneVideos(videosDir: string): string[] {
  if (!fs.existsSync(videosDir)) return [];
  return fs
    .readdirSync(videosDir)
    .map((name) => ({ name, match: /^scene_(\d+).*\.mp4$/.exec(name) }))
    .filter((e): e is { name: string; match: RegExpExecArray } => e.match !== null)
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]) || a.name.localeCompare(b.name))
    .map(e => path.join(videosDir, e.name));
}

// ── Public API ────────────────────────────────────────────────────────────────

export function loadVideoPaths(dirs: ReelDirs): Array<string | null> {
  const listFile = path.join(dirs.outputDir, FILE_NAMES.videoList);
  if (fs.existsSync(listFile)) return readJson(listFile, VideoListSchema);
  log.info('no video list: scanning videos dir', { videosDir: dirs.videosDir });
  return discoverSceneVideos(dirs.videosDir);
}

export function loadDialogue(dirs: ReelDirs): Map<number, DialogueClip[]> {
  const listFile = path.join(dirs.outputDir, FILE_NAMES.audioList);
  const byScene = new Map<number, DialogueClip[]>();
  if (!fs.existsSync(listFile)) return byScene;

  for (const entry of readJson(listFile, AudioListSchema)) {
    byScene.set(entry.scene_id, validClips(entry.scene_id, entry.audio_files));
  }
  return byScene;
}

export function loadScenes(dirs: ReelDirs): Scene[] {
  const videos = loadVideoPaths(dirs);
  const dialogue = loadDialogue(dirs);
  log.info('inputs loaded', { videos: videos.length, audioSceneSets: dialogue.size });

  return videos.map((videoPath, idx) => {
    const sceneId = idx + 1;
    return { sceneId, videoPath, dialogue: dialogue.get(sceneId) ?? [] };
  });
}
