/**
 * FFmpeg / FFprobe process plumbing.
 *
 * Both runners block until the child exits and never throw: the caller gets
 * the exit status plus captured output and decides what a failure means.
 */
import { spawnSync } from 'child_process';
import * as fs from 'fs';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export interface ProcessResult {
  ok: boolean;
  /** null when the process could not be spawned or was killed by a signal */
  status: number | null;
  stdout: string;
  stderr: string;
}

const MAX_BUFFER = 64 * 1024 * 1024;

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Run a binary to completion. A process that cannot be started reports
 * `status: null` with the spawn error in `stderr`.
 */
export function runProcess(bin: string, args: string[], label: string): ProcessResult {
  logger.debug(`${bin} [${label}]`, { args });
  const res = spawnSync(bin, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: MAX_BUFFER,
  });
  if (res.error) {
    return { ok: false, status: null, stdout: '', stderr: res.error.message };
  }
  return {
    ok: res.status === 0,
    status: res.status,
    stdout: res.stdout,
    stderr: res.stderr,
  };
}

/** Run ffmpeg with `-y` prepended so outputs are always overwritten. */
export function runFfmpeg(args: string[], label: string): ProcessResult {
  return runProcess(env.FFMPEG_BIN, ['-y', ...args], label);
}

export function runFfprobe(args: string[], label: string): ProcessResult {
  return runProcess(env.FFPROBE_BIN, args, label);
}

/** First `max` characters of encoder output, trimmed, for log lines. */
export function excerpt(text: string, max: number): string {
  return text.trim().slice(0, max);
}

/**
 * A media input counts as present only when it exists and is non-empty;
 * upstream writes zero-byte placeholders when generation fails.
 */
export function isUsableFile(filePath: string | null | undefined): filePath is string {
  if (!filePath) return false;
  try {
    const stat = fs.statSync(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

/** Plain existence check for dialogue clips; an empty clip still takes its slot. */
export function fileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
