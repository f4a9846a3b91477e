// ============================================
// Foraging System
// Runs every ant's decision cycle against one tile snapshot
// ============================================

import type { Server } from 'socket.io';
import type { RNG, World } from '#shared';
import type { System } from './types';
import { forEachAnt, createTrail } from '../factories';
import { TileEffects, TileIndex } from '../neighborhood';
import { Ant, type ColonyParams, type DepositClaim } from '../../colony/Ant';
import { resolveLeadership } from '../../colony/consensus';

/**
 * ForagingSystem - one decision cycle per ant per generation
 *
 * Order of a generation:
 * 1. Capture the committed tile snapshot
 * 2. Every ant reacts in ascending id order (writes to its tile are staged)
 * 3. Deposit claims are settled per tile and scent, lowest id wins
 * 4. Staged tile writes are committed
 * 5. Granted deposits become new trail markers born this generation
 */
export class ForagingSystem implements System {
  readonly name = 'ForagingSystem';

  constructor(
    private readonly params: ColonyParams,
    private readonly rng: RNG
  ) {}

  update(world: World, generation: number, _io?: Server): void {
    const index = TileIndex.capture(world, this.params.dimension, this.params.boundary);
    const effects = new TileEffects();
    const ants = new Map<number, Ant>();

    forEachAnt(world, (entity, position, state) => {
      const ant = new Ant(entity, state, position, this.params, this.rng);
      ant.react(index.neighborhood(ant.location, state.scope, effects));
      ants.set(entity, ant);
    });

    const claims: DepositClaim[] = [];
    for (const ant of ants.values()) {
      const claim = ant.claim();
      if (claim) claims.push(claim);
    }

    const { granted, denied } = resolveLeadership(claims);
    for (const claim of denied) {
      ants.get(claim.entity)?.withdraw();
    }
    for (const claim of granted) {
      if (claim.communal) ants.get(claim.entity)?.promote();
    }

    effects.commit(world);

    for (const ant of ants.values()) {
      const spawn = ant.offspring();
      if (spawn) {
        createTrail(world, spawn.location, spawn.scent, spawn.strength, generation);
      }
    }
  }
}
