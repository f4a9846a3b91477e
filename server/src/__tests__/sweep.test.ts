// ============================================
// Ant Count Sweep Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { parseConfig } from '../config';
import { runSweep, sweepCounts } from '../sweep';

describe('sweep', () => {
  it('counts from 10 to 150 in steps of 5', () => {
    const counts = sweepCounts(10, 150, 5);

    expect(counts).toHaveLength(29);
    expect(counts[0]).toBe(10);
    expect(counts[counts.length - 1]).toBe(150);
  });

  it('runs once per ant count within the cap', () => {
    const config = parseConfig({
      maxGenerations: 30,
      env: { dimension: [8, 8] },
      nest: { location: [4, 4] },
      morsels: { count: 2, storage: 3 },
    });

    const results = runSweep(config, [1, 2]);

    expect(results.map((result) => result.ants)).toEqual([1, 2]);
    for (const result of results) {
      expect(result.generation).toBeLessThanOrEqual(30);
      if (!result.completed) expect(result.generation).toBe(30);
    }
  });
});
