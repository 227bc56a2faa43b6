/**
 * Reel pipeline orchestrator.
 *
 * Loads scene inputs, composes scenes strictly one at a time in scene order,
 * merges whatever composed successfully, and records the final reel path in a
 * sidecar file for downstream consumers.
 */
import * as fs from 'fs';
import * as path from 'path';
import { FILE_NAMES, resolveDirs, type ReelDirs } from '../config.js';
import { logger } from '../utils/logger.js';
import { probeDuration, type Prober } from '../media/probe.js';
import { loadScenes } from './inputs.js';
import { scheduleDialogue } from './timeline.js';
import { composeScene } from './compositor.js';
import { mergeReel } from './merger.js';
import type { ComposeMode, ComposedScene, PipelineSummary, Scene, SceneOutcome } from '../types.js';

const log = logger.scope('Pipeline');

export interface PipelineOptions {
  dirs?: ReelDirs;
  /** Pre-built scenes; when omitted they are loaded from the output dir */
  scenes?: Scene[];
  probe?: Prober;
}

export interface RunCounts {
  total: number;
  dropped: number;
  byMode: Record<ComposeMode, number>;
}

export function isComposed(outcome: SceneOutcome): outcome is ComposedScene {
  return outcome.status === 'composed';
}

export function summarize(outcomes: readonly SceneOutcome[]): RunCounts {
  const counts: RunCounts = {
    total: outcomes.length,
    dropped: 0,
    byMode: { mixed: 0, video_only: 0, silent_fallback: 0 },
  };
  for (const o of outcomes) {
    if (isComposed(o)) counts.byMode[o.mode] += 1;
    else counts.dropped += 1;
  }
  return counts;
}

/** Schedule and compose a single scene. */
export async function processScene(
  scene: Scene,
  dirs: ReelDirs,
  probe: Prober = probeDuration,
): Promise<SceneOutcome> {
  log.info(`scene ${scene.sceneId}: ${scene.dialogue.length} audio files`);
  const scheduled = await scheduleDialogue(scene.dialogue, { probe });
  return composeScene(scene.sceneId, scene.videoPath, scheduled, {
    composedDir: dirs.composedDir,
    probe,
  });
}

export async function runReelPipeline(options: PipelineOptions = {}): Promise<PipelineSummary> {
  const dirs = options.dirs ?? resolveDirs();
  const probe = options.probe ?? probeDuration;

  fs.mkdirSync(dirs.composedDir, { recursive: true });
  fs.mkdirSync(dirs.finalDir, { recursive: true });

  const scenes = options.scenes ?? loadScenes(dirs);
  log.info('starting run', { scenes: scenes.length, outputDir: dirs.outputDir });

  const outcomes: SceneOutcome[] = [];
  for (const scene of [...scenes].sort((a, b) => a.sceneId - b.sceneId)) {
    const outcome = await processScene(scene, dirs, probe);
    if (isComposed(outcome) && outcome.mode === 'silent_fallback') {
      log.warn(`scene ${scene.sceneId}: composed without dialogue after encode failure`);
    }
    outcomes.push(outcome);
  }

  const merge = await mergeReel(
    outcomes.filter(isComposed).map(o => o.outputPath),
    { finalDir: dirs.finalDir, probe },
  );

  const counts = summarize(outcomes);
  if (!merge.ok) {
    log.error('run failed: no final reel', { reason: merge.reason, ...counts });
    return { scenes: outcomes, merge };
  }

  const sidecarPath = path.join(dirs.outputDir, FILE_NAMES.finalSidecar);
  fs.writeFileSync(sidecarPath, merge.outputPath, 'utf-8');
  log.info('run complete', { finalReel: merge.outputPath, ...counts });

  return { scenes: outcomes, merge, sidecarPath };
}
