// ============================================
// ECS System Runner
// Manages and executes all colony systems in priority order
// ============================================

import type { Server } from 'socket.io';
import type { World } from '#shared';
import type { System } from './types';
import { InvariantViolation } from '../../errors';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all colony systems
 *
 * Systems are executed in priority order (lower numbers first).
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order
   * Tracks per-system timing and logs when a generation is slow.
   * Invariant violations abort the generation; other errors are logged and the next system runs.
   */
  update(world: World, generation: number, io?: Server): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(world, generation, io);
      } catch (error) {
        if (error instanceof InvariantViolation) {
          logger.error({
            event: 'invariant_violation',
            system: system.name,
            generation,
            code: error.code,
            details: error.details,
          }, `System ${system.name} violated ${error.code}`);
          throw error;
        }
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
      }
      const systemMs = performance.now() - systemStart;
      timings.push({ name: system.name, ms: systemMs });
    }

    const totalMs = performance.now() - tickStart;

    // Log breakdown when a generation takes > 10ms
    if (totalMs > 10) {
      // Slowest first
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted
        .filter(t => t.ms > 0.5)
        .map(t => `${t.name}:${t.ms.toFixed(1)}`)
        .join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        generation,
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.filter(t => t.ms > 0.5).map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow generation ${generation} ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
