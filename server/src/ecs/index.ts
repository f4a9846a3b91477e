// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export { World, ComponentStore, Components, Tags, Resources } from '#shared';
export type {
  EntityId,
  ComponentType,
  PositionComponent,
  LifespanComponent,
  AntComponent,
  NestComponent,
  MorselComponent,
  TrailComponent,
  TrailSpawn,
} from '#shared';

// Factories and World Setup
export {
  createWorld,
  getGeneration,
  setGeneration,
  createAnt,
  createNest,
  createMorsel,
  createTrail,
  requirePosition,
  requireAnt,
  requireLifespan,
  forEachAnt,
  forEachNest,
  forEachMorsel,
  forEachTrail,
  getNestStorage,
  type AntOptions,
} from './factories';

// Per-tick tile snapshot and staging ledger
export { TileIndex, TileEffects, Tile, RingTile, CenterTile, type Neighborhood } from './neighborhood';

// Systems
export * from './systems';
