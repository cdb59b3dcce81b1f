#!/usr/bin/env node
/**
 * Channel Regime Replay
 *
 * Entry point: replays a CSV bar file through the strategy engine.
 * Usage: channel-regime-replay [bars.csv]
 */

import { ReplayApp, replayOptionsFromConfig } from './app.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { loadBars } from './replay/barFile.js';

async function main(): Promise<void> {
  logger.info('='.repeat(50));
  logger.info('Channel Regime Replay');
  logger.info('='.repeat(50));

  const barsFile = process.argv[2] ?? config.replay.barsFile;
  const bars = await loadBars(barsFile);

  const app = new ReplayApp(replayOptionsFromConfig(config));
  const summary = app.run(bars);

  logger.info('Summary', summary);
}

main().catch((error: unknown) => {
  logger.error('Replay failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
