// ============================================
// ECS Entity Factories
// Functions to create colony entities with proper components
// ============================================

import {
  Activity,
  COLONY_CONSTANTS,
  Components,
  LocationAwareness,
  Resources,
  Tags,
  World,
  type AntComponent,
  type EntityId,
  type LifespanComponent,
  type Location,
  type NestComponent,
  type PositionComponent,
  type Scent,
  type TrailComponent,
} from '#shared';

// ============================================
// World Setup
// ============================================

/**
 * Create an empty World with the generation counter at 0.
 */
export function createWorld(): World {
  const world = new World();
  world.setResource(Resources.Generation, 0);
  return world;
}

export function getGeneration(world: World): number {
  return world.getResource(Resources.Generation) ?? 0;
}

export function setGeneration(world: World, generation: number): void {
  world.setResource(Resources.Generation, generation);
}

// ============================================
// Entity Factories
// ============================================

export interface AntOptions {
  memorySpan: number;
  concentration: number;
  scope?: number;
  activity?: Activity;
}

/**
 * Create an ant standing at `location`, homed on `nest`.
 * Starts foraging with a full concentration budget.
 */
export function createAnt(world: World, location: Location, nest: Location, options: AntOptions): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { x: location.x, y: location.y });
  world.addComponent(entity, Components.Ant, {
    activity: options.activity ?? Activity.FORAGING,
    role: 'follower',
    concentration: options.concentration,
    nest: { x: nest.x, y: nest.y },
    scope: options.scope ?? COLONY_CONSTANTS.SENSING_RADIUS,
    memory: new LocationAwareness(options.memorySpan),
    offspring: [],
  });

  world.addTag(entity, Tags.Ant);
  return entity;
}

export function createNest(world: World, location: Location, storage = 0): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { x: location.x, y: location.y });
  world.addComponent(entity, Components.Nest, { storage });

  world.addTag(entity, Tags.Nest);
  return entity;
}

/**
 * Create a morsel. Its remaining supply is its lifespan.
 */
export function createMorsel(world: World, location: Location, supply: number): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { x: location.x, y: location.y });
  world.addComponent(entity, Components.Lifespan, { remaining: supply });
  world.addComponent(entity, Components.Morsel, { initialSupply: supply });

  world.addTag(entity, Tags.Morsel);
  return entity;
}

/**
 * Create a trail marker. Its strength is its lifespan.
 * `bornAt` keeps the marker from aging in the generation that spawned it.
 */
export function createTrail(
  world: World,
  location: Location,
  scent: Scent,
  strength: number,
  bornAt = getGeneration(world)
): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { x: location.x, y: location.y });
  world.addComponent(entity, Components.Lifespan, { remaining: strength });
  world.addComponent(entity, Components.Trail, { scent, bornAt });

  world.addTag(entity, Tags.Trail);
  return entity;
}

// ============================================
// Required Component Access
// ============================================

/**
 * Get an entity's position.
 * Throws if component is missing (invariant violation).
 */
export function requirePosition(world: World, entity: EntityId): PositionComponent {
  const comp = world.getComponent(entity, Components.Position);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Position missing on entity ${entity}`);
  }
  return comp;
}

export function requireAnt(world: World, entity: EntityId): AntComponent {
  const comp = world.getComponent(entity, Components.Ant);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Ant missing on entity ${entity}`);
  }
  return comp;
}

export function requireLifespan(world: World, entity: EntityId): LifespanComponent {
  const comp = world.getComponent(entity, Components.Lifespan);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Lifespan missing on entity ${entity}`);
  }
  return comp;
}

// ============================================
// Query Helpers
// ============================================

/**
 * Iterate over all ants in ascending id order.
 */
export function forEachAnt(
  world: World,
  callback: (entity: EntityId, position: PositionComponent, ant: AntComponent) => void
): void {
  world.forEachWithTag(Tags.Ant, (entity) => {
    const pos = world.getComponent(entity, Components.Position);
    const ant = world.getComponent(entity, Components.Ant);
    if (pos && ant) {
      callback(entity, pos, ant);
    }
  });
}

export function forEachNest(
  world: World,
  callback: (entity: EntityId, position: PositionComponent, nest: NestComponent) => void
): void {
  world.forEachWithTag(Tags.Nest, (entity) => {
    const pos = world.getComponent(entity, Components.Position);
    const nest = world.getComponent(entity, Components.Nest);
    if (pos && nest) {
      callback(entity, pos, nest);
    }
  });
}

/**
 * Iterate over all morsels. `supply` is the remaining lifespan.
 */
export function forEachMorsel(
  world: World,
  callback: (entity: EntityId, position: PositionComponent, supply: number, initialSupply: number) => void
): void {
  world.forEachWithTag(Tags.Morsel, (entity) => {
    const pos = world.getComponent(entity, Components.Position);
    const lifespan = world.getComponent(entity, Components.Lifespan);
    const morsel = world.getComponent(entity, Components.Morsel);
    if (pos && lifespan && morsel) {
      callback(entity, pos, lifespan.remaining, morsel.initialSupply);
    }
  });
}

/**
 * Iterate over all trail markers. `strength` is the remaining lifespan.
 */
export function forEachTrail(
  world: World,
  callback: (entity: EntityId, position: PositionComponent, trail: TrailComponent, strength: number) => void
): void {
  world.forEachWithTag(Tags.Trail, (entity) => {
    const pos = world.getComponent(entity, Components.Position);
    const trail = world.getComponent(entity, Components.Trail);
    const lifespan = world.getComponent(entity, Components.Lifespan);
    if (pos && trail && lifespan) {
      callback(entity, pos, trail, lifespan.remaining);
    }
  });
}

/**
 * Food stored across all nests
 */
export function getNestStorage(world: World): number {
  let storage = 0;
  forEachNest(world, (_entity, _pos, nest) => {
    storage += nest.storage;
  });
  return storage;
}
