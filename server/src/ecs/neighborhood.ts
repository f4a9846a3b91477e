// ============================================
// Tile Snapshot & Neighborhoods
// Per-tick read view of the grid plus a staging ledger for center-tile writes
// ============================================

import {
  COLONY_CONSTANTS,
  Components,
  applyBoundary,
  isInside,
  ringOffsets,
  tileKey,
  type BoundaryPolicy,
  type Dimension,
  type EntityId,
  type Location,
  type MorselOnTile,
  type NestOnTile,
  type Offset,
  type Scent,
  type TileEntity,
  type TrailOnTile,
  type World,
} from '#shared';
import { InvariantViolation } from '../errors';

// ============================================
// Tiles
// ============================================

type EntityOfKind<K extends TileEntity['kind']> = Extract<TileEntity, { kind: K }>;

function isKind<K extends TileEntity['kind']>(kind: K) {
  return (entity: TileEntity): entity is EntityOfKind<K> => entity.kind === kind;
}

/**
 * Read-only view of one tile as it was at the start of the tick
 */
export class Tile {
  constructor(
    readonly location: Location,
    readonly entities: readonly TileEntity[]
  ) {}

  has(kind: TileEntity['kind']): boolean {
    return this.entities.some((entity) => entity.kind === kind);
  }

  /**
   * First entity of a kind, in ascending id order
   */
  find<K extends TileEntity['kind']>(kind: K): EntityOfKind<K> | undefined {
    return this.entities.find(isKind(kind));
  }

  all<K extends TileEntity['kind']>(kind: K): EntityOfKind<K>[] {
    return this.entities.filter(isKind(kind));
  }

  trail(scent: Scent): TrailOnTile | undefined {
    return this.all('trail').find((trail) => trail.scent === scent);
  }
}

/**
 * A ring tile together with its displacement from the center
 */
export class RingTile extends Tile {
  constructor(
    readonly offset: Offset,
    location: Location,
    entities: readonly TileEntity[]
  ) {
    super(location, entities);
  }
}

/**
 * The tile an ant stands on. Reads come from the snapshot,
 * writes are staged in the tick's ledger.
 */
export class CenterTile extends Tile {
  constructor(
    location: Location,
    entities: readonly TileEntity[],
    private readonly effects: TileEffects
  ) {
    super(location, entities);
  }

  store(nest: NestOnTile): void {
    this.effects.store(nest.entity);
  }

  /**
   * Take one unit of food. False once the morsel is exhausted.
   */
  pickup(morsel: MorselOnTile): boolean {
    return this.effects.requestPickup(morsel);
  }

  reinforce(trail: TrailOnTile, amount: number): void {
    this.effects.reinforce(trail.entity, amount);
  }

  clear(trail: TrailOnTile): void {
    this.effects.clear(trail.entity);
  }
}

export interface Neighborhood {
  center: CenterTile;
  ring: readonly RingTile[];
}

// ============================================
// Staging Ledger
// ============================================

/**
 * Writes to center tiles, collected during a tick and applied at its end.
 */
export class TileEffects {
  private stores = new Map<EntityId, number>();
  private pickups = new Map<EntityId, number>();
  private reinforcements = new Map<EntityId, number>();
  private clears = new Set<EntityId>();

  store(nest: EntityId): void {
    this.stores.set(nest, (this.stores.get(nest) ?? 0) + 1);
  }

  /**
   * Grant a pickup while the snapshot supply minus pickups already granted is positive
   */
  requestPickup(morsel: MorselOnTile): boolean {
    const granted = this.pickups.get(morsel.entity) ?? 0;
    if (morsel.supply - granted <= 0) return false;
    this.pickups.set(morsel.entity, granted + 1);
    return true;
  }

  reinforce(trail: EntityId, amount: number): void {
    if (amount <= 0) return;
    this.reinforcements.set(trail, (this.reinforcements.get(trail) ?? 0) + amount);
  }

  clear(trail: EntityId): void {
    this.clears.add(trail);
  }

  get isEmpty(): boolean {
    return (
      this.stores.size === 0 &&
      this.pickups.size === 0 &&
      this.reinforcements.size === 0 &&
      this.clears.size === 0
    );
  }

  /**
   * Apply every staged write: stores, pickups, reinforcements, then clears.
   * A cleared marker ends the tick at zero even if it was also reinforced.
   */
  commit(world: World): void {
    for (const [entity, count] of this.stores) {
      const nest = world.getComponent(entity, Components.Nest);
      if (nest) nest.storage = Math.min(COLONY_CONSTANTS.MAX_STORAGE, nest.storage + count);
    }
    for (const [entity, count] of this.pickups) {
      const supply = world.getComponent(entity, Components.Lifespan);
      if (supply) supply.remaining = Math.max(0, supply.remaining - count);
    }
    for (const [entity, amount] of this.reinforcements) {
      const strength = world.getComponent(entity, Components.Lifespan);
      if (strength) strength.remaining = Math.min(COLONY_CONSTANTS.MAX_STRENGTH, strength.remaining + amount);
    }
    for (const entity of this.clears) {
      const strength = world.getComponent(entity, Components.Lifespan);
      if (strength) strength.remaining = 0;
    }

    this.stores.clear();
    this.pickups.clear();
    this.reinforcements.clear();
    this.clears.clear();
  }
}

// ============================================
// Tile Index
// ============================================

function toTileEntity(world: World, entity: EntityId): TileEntity | undefined {
  const ant = world.getComponent(entity, Components.Ant);
  if (ant) return { kind: 'ant', entity, activity: ant.activity };

  const nest = world.getComponent(entity, Components.Nest);
  if (nest) return { kind: 'nest', entity, storage: nest.storage };

  const lifespan = world.getComponent(entity, Components.Lifespan);
  if (!lifespan) return undefined;

  if (world.hasComponent(entity, Components.Morsel)) {
    return { kind: 'morsel', entity, supply: lifespan.remaining };
  }
  const trail = world.getComponent(entity, Components.Trail);
  if (trail) return { kind: 'trail', entity, scent: trail.scent, strength: lifespan.remaining };

  return undefined;
}

/**
 * Immutable snapshot of every occupied tile, captured once per tick.
 */
export class TileIndex {
  private constructor(
    private readonly tiles: ReadonlyMap<string, readonly TileEntity[]>,
    readonly dimension: Dimension,
    readonly boundary: BoundaryPolicy
  ) {}

  /**
   * Capture the committed state of the world.
   * Throws when a tile holds two markers of the same scent.
   */
  static capture(world: World, dimension: Dimension, boundary: BoundaryPolicy): TileIndex {
    const tiles = new Map<string, TileEntity[]>();

    for (const entity of world.query(Components.Position)) {
      const position = world.getComponent(entity, Components.Position);
      const tileEntity = toTileEntity(world, entity);
      if (!position || !tileEntity) continue;

      const key = tileKey(position);
      const occupants = tiles.get(key) ?? [];
      if (
        tileEntity.kind === 'trail' &&
        occupants.some((other) => other.kind === 'trail' && other.scent === tileEntity.scent)
      ) {
        throw new InvariantViolation('DUPLICATE_TRAIL', `Two ${tileEntity.scent} trails on tile ${key}`, {
          tile: key,
          scent: tileEntity.scent,
          entity,
        });
      }
      occupants.push(tileEntity);
      tiles.set(key, occupants);
    }

    return new TileIndex(tiles, dimension, boundary);
  }

  entitiesAt(location: Location): readonly TileEntity[] {
    return this.tiles.get(tileKey(location)) ?? [];
  }

  /**
   * Center tile plus the ring at `radius`. Undefined for a location off the grid.
   * Ring positions off the grid wrap, or are omitted under the clamp policy.
   */
  neighborhood(location: Location, radius: number, effects: TileEffects): Neighborhood | undefined {
    if (!isInside(location, this.dimension)) return undefined;

    const center = new CenterTile({ ...location }, this.entitiesAt(location), effects);
    const ring: RingTile[] = [];
    for (const offset of ringOffsets(radius)) {
      const raw = { x: location.x + offset.x, y: location.y + offset.y };
      if (this.boundary === 'clamp' && !isInside(raw, this.dimension)) continue;
      const tileLocation = applyBoundary(raw, this.dimension, this.boundary);
      ring.push(new RingTile(offset, tileLocation, this.entitiesAt(tileLocation)));
    }

    return { center, ring };
  }
}
