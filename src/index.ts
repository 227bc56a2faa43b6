#!/usr/bin/env node
/**
 * Reel Composer: entry point.
 *
 * `compose` (the default) turns the per-scene videos and dialogue clips under
 * OUTPUT_DIR into final/final_reel.mp4. Exits non-zero when no reel could be
 * produced.
 */
import { logger } from './utils/logger.js';
import { runReelPipeline } from './pipeline/index.js';

const [,, command] = process.argv;

async function main(): Promise<void> {
  logger.info('Reel Composer: starting', { command: command ?? 'compose' });

  switch (command) {
    case undefined:
    case 'compose': {
      const summary = await runReelPipeline();
      if (summary.merge.ok) {
        logger.info(`Success! Final reel: ${summary.merge.outputPath}`);
      } else {
        logger.error('Failed to create final reel', { reason: summary.merge.reason });
        process.exitCode = 1;
      }
      break;
    }

    default:
      logger.error(`Unknown command "${command}": expected "compose"`);
      process.exitCode = 1;
  }
}

main().catch((err) => {
  logger.error('Fatal error', { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});

export { runReelPipeline };
