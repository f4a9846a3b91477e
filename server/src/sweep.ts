// ============================================
// Ant Count Sweep
// Runs the same colony with a growing number of ants
// ============================================

import type { SimConfig } from './config';
import { logger } from './logger';
import { ColonySimulation, type RunOutcome } from './simulation';

export const SWEEP_ANT_COUNTS = { from: 10, to: 150, step: 5 } as const;

// Used when the configuration sets no cap of its own
export const DEFAULT_SWEEP_CAP = 20000;

export interface SweepResult extends RunOutcome {
  ants: number;
}

export function sweepCounts(from: number, to: number, step: number): number[] {
  const counts: number[] = [];
  for (let count = from; count <= to; count += step) {
    counts.push(count);
  }
  return counts;
}

/**
 * Run the configured colony once per ant count and log how long each took.
 */
export function runSweep(
  config: SimConfig,
  counts: readonly number[] = sweepCounts(SWEEP_ANT_COUNTS.from, SWEEP_ANT_COUNTS.to, SWEEP_ANT_COUNTS.step)
): SweepResult[] {
  const cap = config.maxGenerations ?? DEFAULT_SWEEP_CAP;
  const results: SweepResult[] = [];

  for (const ants of counts) {
    const simulation = new ColonySimulation({ ...config, ants: { ...config.ants, count: ants } });
    const outcome = simulation.run(cap);
    results.push({ ants, ...outcome });

    if (outcome.completed) {
      logger.info({ event: 'sweep_run', ants, generations: outcome.generation }, `${ants} ants: ${outcome.generation} generations`);
    } else {
      logger.warn(
        { event: 'sweep_timeout', ants, generations: outcome.generation, collected: outcome.collected },
        `${ants} ants: timed out after ${outcome.generation} generations`
      );
    }
  }

  return results;
}
