/**
 * Duration probing. A failed probe never blocks the pipeline: it resolves to
 * the default duration with `ok: false` so callers can tell the two apart.
 */
import { TIMELINE } from '../config.js';
import { logger } from '../utils/logger.js';
import { runFfprobe } from './ffmpeg.js';
import type { ProbeResult } from '../types.js';

export type Prober = (filePath: string) => Promise<ProbeResult>;

function defaulted(reason: string): ProbeResult {
  return { ok: false, seconds: TIMELINE.defaultDurationSeconds, reason };
}

export async function probeDuration(filePath: string): Promise<ProbeResult> {
  const res = runFfprobe(
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
    'probeDuration',
  );

  if (!res.ok) {
    const reason = res.stderr.trim() || `ffprobe exited with status ${String(res.status)}`;
    logger.debug('Probe: failed, using default duration', { filePath, reason });
    return defaulted(reason);
  }

  const raw = res.stdout.trim();
  const seconds = raw === '' ? NaN : Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    logger.debug('Probe: unparsable duration, using default', { filePath, raw });
    return defaulted(`unparsable duration output: "${raw}"`);
  }

  return { ok: true, seconds };
}

export async function durationOf(filePath: string): Promise<number> {
  return (await probeDuration(filePath)).seconds;
}
