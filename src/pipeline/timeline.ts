/**
 * Dialogue timeline: places a scene's lines back to back after a short
 * lead-in, with a fixed gap between them.
 *
 * The span is not capped to the video length; the scene encode
 * trims the mix with -shortest.
 */
import { TIMELINE } from '../config.js';
import { logger } from '../utils/logger.js';
import { fileExists } from '../media/ffmpeg.js';
import { probeDuration, type Prober } from '../media/probe.js';
import type { DialogueClip, ScheduledClip } from '../types.js';

const log = logger.scope('Timeline');

export interface ScheduleOptions {
  leadIn?: number;
  gap?: number;
  probe?: Prober;
  exists?: (filePath: string) => boolean;
}

export async function scheduleDialogue(
  clips: readonly DialogueClip[],
  options: ScheduleOptions = {},
): Promise<ScheduledClip[]> {
  const {
    leadIn = TIMELINE.leadInSeconds,
    gap = TIMELINE.gapSeconds,
    probe = probeDuration,
    exists = fileExists,
  } = options;

  // Array.prototype.sort is stable, so equal orders keep input order
  const ordered = [...clips].sort((a, b) => a.order - b.order);
  const scheduled: ScheduledClip[] = [];
  let cursor = leadIn;

  for (const clip of ordered) {
    if (!exists(clip.path)) {
      log.debug('skipping missing clip', { path: clip.path, order: clip.order });
      continue;
    }

    const probed = await probe(clip.path);
    scheduled.push({
      ...clip,
      startOffset: cursor,
      duration: probed.seconds,
      durationSource: probed.ok ? 'probed' : 'defaulted',
    });
    cursor += probed.seconds + gap;
  }

  return scheduled;
}

/** End time of the last scheduled clip, or 0 when nothing is scheduled. */
export function scheduledSpan(scheduled: readonly ScheduledClip[]): number {
  const last = scheduled[scheduled.length - 1];
  return last ? last.startOffset + last.duration : 0;
}
