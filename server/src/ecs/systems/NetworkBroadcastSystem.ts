// ============================================
// Network Broadcast System
// Handles all network broadcasts at end of generation
// ============================================

import type { Server } from 'socket.io';
import type { World } from '#shared';
import type { System } from './types';
import type { SimConfig } from '../../config';
import { buildColonyStatsMessage, buildWorldSnapshot } from '../serialization/colonySerializer';

/**
 * NetworkBroadcastSystem - Handles end-of-generation broadcasts
 *
 * Broadcasts (every `broadcastInterval` generations):
 * - World snapshot (visible kinds only)
 * - Colony stats
 *
 * This system runs last (highest priority number).
 */
export class NetworkBroadcastSystem implements System {
  readonly name = 'NetworkBroadcastSystem';

  // Generations since the last broadcast
  private ticksSinceBroadcast = 0;

  constructor(private readonly config: SimConfig) {}

  update(world: World, _generation: number, io?: Server): void {
    if (!io) return;

    this.ticksSinceBroadcast++;
    if (this.ticksSinceBroadcast < this.config.broadcastInterval) return;
    this.ticksSinceBroadcast = 0;

    io.emit('worldSnapshot', buildWorldSnapshot(world, this.config));
    io.emit('colonyStats', buildColonyStatsMessage(world, this.config));
  }
}
