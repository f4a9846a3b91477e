// ============================================
// ECS System Types
// ============================================

import type { Server } from 'socket.io';
import type { World } from '#shared';

/**
 * Base System interface
 * All colony systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called once per generation
   * @param world The ECS World containing all entities and components
   * @param generation The generation being computed (starts at 1)
   * @param io Socket.io server for network broadcasts, absent in headless runs
   */
  update(world: World, generation: number, io?: Server): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Foraging (snapshot, every ant reacts, staged writes committed, markers spawned)
 * 2. Decay (markers age, empty markers and morsels are reaped)
 * 3. Network (broadcast state)
 */
export const SystemPriority = {
  // Agent decisions
  FORAGING: 100,

  // Life cycle
  DECAY: 200,

  // Network broadcasting - runs last
  NETWORK: 900,
} as const;
