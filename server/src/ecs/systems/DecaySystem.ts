// ============================================
// Decay System
// Ages trail markers and reaps spent markers and morsels
// ============================================

import type { Server } from 'socket.io';
import { tileKey, type EntityId, type World } from '#shared';
import type { System } from './types';
import { forEachMorsel, forEachTrail, requireLifespan } from '../factories';
import { InvariantViolation } from '../../errors';

/**
 * DecaySystem - marker aging and cleanup
 *
 * Handles:
 * - Strength decay by one per generation (markers spawned this generation are skipped)
 * - Removal of markers and morsels with nothing left
 * - The at-most-one-marker-per-scent-per-tile check
 */
export class DecaySystem implements System {
  readonly name = 'DecaySystem';

  update(world: World, generation: number, _io?: Server): void {
    const spent: EntityId[] = [];
    const markers = new Map<string, EntityId>();

    forEachTrail(world, (entity, pos, trail) => {
      const strength = requireLifespan(world, entity);
      if (trail.bornAt !== generation) {
        strength.remaining = Math.max(0, strength.remaining - 1);
      }
      if (strength.remaining <= 0) {
        spent.push(entity);
        return;
      }

      const key = `${tileKey(pos)}|${trail.scent}`;
      const other = markers.get(key);
      if (other !== undefined) {
        throw new InvariantViolation('DUPLICATE_TRAIL', `Two ${trail.scent} trails on tile ${tileKey(pos)}`, {
          tile: tileKey(pos),
          scent: trail.scent,
          entities: [other, entity],
        });
      }
      markers.set(key, entity);
    });

    forEachMorsel(world, (entity, _pos, supply) => {
      if (supply <= 0) spent.push(entity);
    });

    for (const entity of spent) {
      world.destroyEntity(entity);
    }
  }
}
