#!/usr/bin/env tsx
// ============================================
// Sweep Script - Generations to completion per ant count
// ============================================
// Usage: tsx scripts/sweep.ts [configPath]

import { loadConfig } from '../server/src/config';
import { describeError } from '../server/src/errors';
import { logger } from '../server/src/logger';
import { runSweep } from '../server/src/sweep';

async function main(): Promise<void> {
  const config = await loadConfig(process.argv[2]);
  const results = runSweep(config);
  const completed = results.filter((result) => result.completed).length;
  logger.info({ event: 'sweep_done', runs: results.length, completed }, `Sweep finished: ${completed}/${results.length} runs completed`);
}

main().catch((error: unknown) => {
  logger.fatal({ event: 'sweep_failed', ...describeError(error) }, 'Sweep failed');
  process.exitCode = 1;
});
