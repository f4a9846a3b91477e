// ============================================
// Colony Serialization
// Convert colony entities to network formats
// ============================================

import type {
  AntView,
  ColonyStatsMessage,
  MorselView,
  NestView,
  TrailView,
  World,
  WorldConfigMessage,
  WorldSnapshotMessage,
} from '#shared';
import { gridDimension, isVisible, totalStorage, type SimConfig } from '../../config';
import { forEachAnt, forEachMorsel, forEachNest, forEachTrail, getGeneration, getNestStorage } from '../factories';

export function buildWorldConfigMessage(config: SimConfig): WorldConfigMessage {
  return {
    type: 'worldConfig',
    dimension: gridDimension(config),
    tileSide: config.env.tileSide,
    background: config.env.background,
    showGrid: isVisible(config, 'grid'),
    totalStorage: totalStorage(config),
  };
}

/**
 * Build a WorldSnapshotMessage holding only the kinds the presentation flags show.
 */
export function buildWorldSnapshot(world: World, config: SimConfig): WorldSnapshotMessage {
  const ants: AntView[] = [];
  const trails: TrailView[] = [];
  const morsels: MorselView[] = [];
  let nest: NestView | null = null;

  if (isVisible(config, 'ant')) {
    forEachAnt(world, (entity, pos, ant) => {
      ants.push({ id: entity, location: { x: pos.x, y: pos.y }, activity: ant.activity });
    });
  }

  forEachTrail(world, (entity, pos, trail, strength) => {
    if (!isVisible(config, 'trail', trail.scent)) return;
    trails.push({ id: entity, location: { x: pos.x, y: pos.y }, scent: trail.scent, strength });
  });

  if (isVisible(config, 'morsel')) {
    forEachMorsel(world, (entity, pos, supply, initialSupply) => {
      morsels.push({ id: entity, location: { x: pos.x, y: pos.y }, supply, initialSupply });
    });
  }

  if (isVisible(config, 'nest')) {
    forEachNest(world, (entity, pos, nestComp) => {
      nest ??= { id: entity, location: { x: pos.x, y: pos.y }, storage: nestComp.storage };
    });
  }

  return {
    type: 'worldSnapshot',
    generation: getGeneration(world),
    ants,
    trails,
    morsels,
    nest,
  };
}

export function buildColonyStatsMessage(world: World, config: SimConfig): ColonyStatsMessage {
  return {
    type: 'colonyStats',
    generation: getGeneration(world),
    collected: getNestStorage(world),
    totalStorage: totalStorage(config),
  };
}
