// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { World } from '#shared';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import { InvariantViolation } from '../../../errors';
import { logger } from '../../../logger';
import { createTestWorld } from './testUtils';

function recordingSystem(name: string, calls: string[], fail?: () => never): System {
  return {
    name,
    update: (_world: World, generation: number) => {
      calls.push(`${name}@${generation}`);
      if (fail) fail();
    },
  };
}

describe('SystemRunner', () => {
  let world: World;
  let runner: SystemRunner;

  beforeEach(() => {
    world = createTestWorld();
    runner = new SystemRunner();
    vi.mocked(logger.error).mockClear();
  });

  it('runs systems in priority order', () => {
    const calls: string[] = [];
    runner.register(recordingSystem('late', calls), 900);
    runner.register(recordingSystem('early', calls), 100);
    runner.register(recordingSystem('middle', calls), 200);

    runner.update(world, 4);

    expect(calls).toEqual(['early@4', 'middle@4', 'late@4']);
    expect(runner.getSystemNames()).toEqual([
      'early (priority: 100)',
      'middle (priority: 200)',
      'late (priority: 900)',
    ]);
  });

  it('logs ordinary errors and keeps going', () => {
    const calls: string[] = [];
    runner.register(
      recordingSystem('broken', calls, () => {
        throw new Error('boom');
      }),
      100
    );
    runner.register(recordingSystem('after', calls), 200);

    runner.update(world, 1);

    expect(calls).toEqual(['broken@1', 'after@1']);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('aborts the generation on an invariant violation', () => {
    const calls: string[] = [];
    runner.register(
      recordingSystem('strict', calls, () => {
        throw new InvariantViolation('DUPLICATE_TRAIL', 'two markers');
      }),
      100
    );
    runner.register(recordingSystem('after', calls), 200);

    expect(() => runner.update(world, 1)).toThrow(InvariantViolation);
    expect(calls).toEqual(['strict@1']);
  });
});
