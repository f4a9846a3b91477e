// ============================================
// Telemetry Module
// Aggregate colony statistics for periodic logging
// ============================================

import { Activity, Scent } from '#shared';
import { forEachAnt, forEachMorsel, forEachTrail, getGeneration, getNestStorage, type World } from './ecs';

/**
 * Aggregate statistics about the colony
 */
export interface ColonyStats {
  generation: number;
  foragingAnts: number;
  carryingAnts: number;
  colonyTrails: number;
  foodTrails: number;
  colonyTrailStrength: number;
  foodTrailStrength: number;
  morselsLeft: number;
  supplyLeft: number;
  collected: number;
}

/**
 * Calculate aggregate statistics about the colony
 */
export function calculateColonyStats(world: World): ColonyStats {
  const stats: ColonyStats = {
    generation: getGeneration(world),
    foragingAnts: 0,
    carryingAnts: 0,
    colonyTrails: 0,
    foodTrails: 0,
    colonyTrailStrength: 0,
    foodTrailStrength: 0,
    morselsLeft: 0,
    supplyLeft: 0,
    collected: getNestStorage(world),
  };

  forEachAnt(world, (_entity, _pos, ant) => {
    if (ant.activity === Activity.CARRYING) {
      stats.carryingAnts++;
    } else {
      stats.foragingAnts++;
    }
  });

  forEachTrail(world, (_entity, _pos, trail, strength) => {
    if (trail.scent === Scent.COLONY) {
      stats.colonyTrails++;
      stats.colonyTrailStrength += strength;
    } else {
      stats.foodTrails++;
      stats.foodTrailStrength += strength;
    }
  });

  forEachMorsel(world, (_entity, _pos, supply) => {
    if (supply <= 0) return;
    stats.morselsLeft++;
    stats.supplyLeft += supply;
  });

  return stats;
}
