#!/usr/bin/env tsx
/**
 * Pre-flight check for Reel Composer.
 * Verifies the encoder binaries, output directories and hand-off files.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { existsSync } from 'fs';
import { join } from 'path';
import { env, resolveDirs, FILE_NAMES } from '../src/config.js';
import { runFfmpeg, runFfprobe } from '../src/media/ffmpeg.js';
import { discoverSceneVideos } from '../src/pipeline/inputs.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string, detail: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  ${detail}`);

let anyRequiredFailed = false;

// ── Section: Encoder binaries ─────────────────────────────────────────────────

console.log(`\n${BOLD}=== Reel Composer: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Encoder binaries${RESET}`);

for (const [label, res] of [
  [env.FFMPEG_BIN,  runFfmpeg(['-version'], 'check-env')],
  [env.FFPROBE_BIN, runFfprobe(['-version'], 'check-env')],
] as const) {
  if (res.ok) {
    pass(label, res.stdout.split('\n')[0] ?? '');
  } else {
    fail(label, `not runnable (${res.stderr.trim() || `status ${String(res.status)}`}): install ffmpeg or set FFMPEG_BIN / FFPROBE_BIN`);
    anyRequiredFailed = true;
  }
}

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Configuration${RESET}`);

const dirs = resolveDirs();
note('OUTPUT_DIR',   dirs.outputDir);
note('VIDEOS_DIR',   dirs.videosDir);
note('COMPOSED_DIR', dirs.composedDir);
note('FINAL_DIR',    dirs.finalDir);
note('LOG_LEVEL',    `${env.LOG_LEVEL} (${env.LOG_FORMAT})`);

// ── Section: Inputs ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Inputs${RESET}`);

if (existsSync(dirs.outputDir)) {
  pass('output directory', dirs.outputDir);
} else {
  fail('output directory', `Create: mkdir -p "${dirs.outputDir}"`);
  anyRequiredFailed = true;
}

const videoList = join(dirs.outputDir, FILE_NAMES.videoList);
const audioList = join(dirs.outputDir, FILE_NAMES.audioList);

if (existsSync(videoList)) {
  pass(FILE_NAMES.videoList, videoList);
} else {
  const found = discoverSceneVideos(dirs.videosDir);
  note(FILE_NAMES.videoList, `(missing; will scan videos dir, found ${found.length} scene file(s))`);
}

if (existsSync(audioList)) {
  pass(FILE_NAMES.audioList, audioList);
} else {
  note(FILE_NAMES.audioList, '(missing: scenes will be composed without dialogue)');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run compose${RESET}\n`);
}
