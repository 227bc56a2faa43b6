import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Local storage: per-stage dirs default to subfolders of OUTPUT_DIR
  OUTPUT_DIR:   z.string().min(1).default('outputs'),
  VIDEOS_DIR:   z.string().min(1).optional(),
  AUDIO_DIR:    z.string().min(1).optional(),
  COMPOSED_DIR: z.string().min(1).optional(),
  FINAL_DIR:    z.string().min(1).optional(),

  // Encoder binaries
  FFMPEG_BIN:   z.string().min(1).default('ffmpeg'),
  FFPROBE_BIN:  z.string().min(1).default('ffprobe'),

  // Logging
  LOG_LEVEL:    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:   z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Directories ───────────────────────────────────────────────────────────────

export interface ReelDirs {
  outputDir:   string;
  videosDir:   string;
  audioDir:    string;
  composedDir: string;
  finalDir:    string;
}

/**
 * Resolve the working directory set. Components take this as a parameter so
 * tests can point a run at a temp dir.
 */
export function resolveDirs(outputDir: string = env.OUTPUT_DIR): ReelDirs {
  const useEnv = outputDir === env.OUTPUT_DIR;
  return {
    outputDir,
    videosDir:   (useEnv && env.VIDEOS_DIR)   || path.join(outputDir, 'videos'),
    audioDir:    (useEnv && env.AUDIO_DIR)    || path.join(outputDir, 'audio'),
    composedDir: (useEnv && env.COMPOSED_DIR) || path.join(outputDir, 'composed'),
    finalDir:    (useEnv && env.FINAL_DIR)    || path.join(outputDir, 'final'),
  };
}

export const FILE_NAMES = {
  videoList:    'video_paths.json',
  audioList:    'audio_paths.json',
  concatList:   'concat_list.txt',
  finalReel:    'final_reel.mp4',
  finalSidecar: 'final_reel_path.txt',
} as const;

// ── Timeline ──────────────────────────────────────────────────────────────────

export const TIMELINE = {
  leadInSeconds:          0.2,  // silence before the first line
  gapSeconds:             0.3,  // minimum silence between lines
  defaultDurationSeconds: 5.0,  // used whenever a probe fails
} as const;

// ── Output geometry & target ──────────────────────────────────────────────────

export const REEL = {
  width:            1080,
  height:           1920,
  targetMinSeconds: 30,
  targetMaxSeconds: 45,
} as const;

// ── Encode profiles ───────────────────────────────────────────────────────────

export const SCENE_ENCODE = {
  videoCodec:   'libx264',
  preset:       'fast',
  audioCodec:   'aac',
  audioBitrate: '128k',
  errorExcerpt: 200,
} as const;

export const REEL_ENCODE = {
  videoCodec:   'libx264',
  preset:       'medium',
  crf:          23,
  audioCodec:   'aac',
  audioBitrate: '128k',
  errorExcerpt: 500,
} as const;
