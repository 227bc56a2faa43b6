import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ProcessResult } from '../src/media/ffmpeg.js';
import type { ProbeResult, ScheduledClip } from '../src/types.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'reel-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Write a small non-empty stand-in media file and return its path. */
export function touch(dir: string, name: string): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, 'media');
  return file;
}

export const OK: ProcessResult = { ok: true, status: 0, stdout: '', stderr: '' };

export function failed(stderr: string, status = 1): ProcessResult {
  return { ok: false, status, stdout: '', stderr };
}

/** Fake ffmpeg: writes its output file (always the last argument) and succeeds. */
export function writesOutput(args: string[]): ProcessResult {
  const out = args[args.length - 1];
  if (out) fs.writeFileSync(out, 'encoded');
  return OK;
}

/** Prober that reports known durations by path and defaults everything else. */
export function probeFrom(durations: Record<string, number>) {
  return async (filePath: string): Promise<ProbeResult> => {
    const seconds = durations[filePath];
    return seconds === undefined
      ? { ok: false, seconds: 5.0, reason: 'not in fixture' }
      : { ok: true, seconds };
  };
}

export function scheduledClip(
  clipPath: string,
  order: number,
  startOffset: number,
  duration: number,
): ScheduledClip {
  return { path: clipPath, order, startOffset, duration, durationSource: 'probed' };
}
