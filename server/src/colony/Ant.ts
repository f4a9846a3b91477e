// ============================================
// Ant Agent
// Per-tick decision cycle over a neighborhood snapshot
// ============================================

import {
  Activity,
  Scent,
  applyBoundary,
  manhattan,
  randInt,
  randItem,
  ringOffsets,
  shuffled,
  stepTowards,
  translate,
  type AntComponent,
  type BoundaryPolicy,
  type Dimension,
  type EntityId,
  type Location,
  type PositionComponent,
  type RNG,
  type Role,
  type TrailSpawn,
} from '#shared';
import type { CenterTile, Neighborhood, RingTile } from '../ecs/neighborhood';
import { InvariantViolation } from '../errors';
import { scentOf, switchActivity, targetKindOf, targetScentOf } from './activity';
import { decreaseBy } from './concentration';

/**
 * Colony-wide tuning shared by every ant
 */
export interface ColonyParams {
  dimension: Dimension;
  boundary: BoundaryPolicy;
  maxConcentration: number;
  concentrationDecay: number;
  reinforcementRatio: number;
}

/**
 * A deposit an ant wants to make this tick, pending leadership resolution
 */
export interface DepositClaim {
  entity: EntityId;
  spawn: TrailSpawn;
  // Other ants stood on the same tile when the claim was made
  communal: boolean;
}

/**
 * Ant - behavior wrapped around an entity's Ant and Position components.
 * Mutates only its own components; writes to its tile go through the center tile's ledger.
 */
export class Ant {
  private communal = false;

  constructor(
    readonly entity: EntityId,
    private readonly state: AntComponent,
    private readonly position: PositionComponent,
    private readonly params: ColonyParams,
    private readonly rng: RNG
  ) {}

  get activity(): Activity {
    return this.state.activity;
  }

  get role(): Role {
    return this.state.role;
  }

  get concentration(): number {
    return this.state.concentration;
  }

  get location(): Location {
    return { x: this.position.x, y: this.position.y };
  }

  /**
   * Run one tick of the decision cycle.
   * Throws InvariantViolation when the substrate supplies no neighborhood.
   */
  react(neighborhood: Neighborhood | undefined): void {
    if (!neighborhood) {
      throw new InvariantViolation('MISSING_NEIGHBORHOOD', `No neighborhood for ant ${this.entity}`, {
        entity: this.entity,
        location: this.location,
      });
    }

    this.state.role = 'follower';
    this.state.memory.insert(this.location);

    this.assessTargets(neighborhood.center);
    this.reinforceTrail(neighborhood.center);
    this.suppressTrail(neighborhood);
    this.move(neighborhood);
  }

  /**
   * The pending deposit, if the ant wants to lay a marker this tick
   */
  claim(): DepositClaim | undefined {
    const spawn = this.state.offspring[0];
    if (!spawn) return undefined;
    return { entity: this.entity, spawn, communal: this.communal };
  }

  /**
   * Won the deposit for its tile while sharing it with other ants
   */
  promote(): void {
    this.state.role = 'leader';
  }

  /**
   * Lost the deposit to another ant on the same tile
   */
  withdraw(): void {
    this.state.offspring.length = 0;
  }

  /**
   * Drain the marker this ant emitted this tick (zero or one).
   */
  offspring(): TrailSpawn | undefined {
    const spawned = this.state.offspring.splice(0);
    if (spawned.length > 1) {
      throw new InvariantViolation('EXCESS_OFFSPRING', `Ant ${this.entity} emitted ${spawned.length} markers in one tick`, {
        entity: this.entity,
        count: spawned.length,
      });
    }
    return spawned[0];
  }

  // ============================================
  // Decision Steps
  // ============================================

  /**
   * Store food at the nest, pick food up from a morsel,
   * and switch activity when the goal is reached.
   */
  private assessTargets(center: CenterTile): void {
    const nest = center.find('nest');
    if (nest) {
      if (this.state.activity === Activity.CARRYING) {
        center.store(nest);
        this.reachGoal();
      }
      this.state.concentration = this.params.maxConcentration;
    }

    const morsel = center.find('morsel');
    if (morsel) {
      if (targetKindOf(this.state.activity) === 'morsel' && center.pickup(morsel)) {
        this.reachGoal();
      }
      this.state.concentration = this.params.maxConcentration;
    }
  }

  private reachGoal(): void {
    this.state.activity = switchActivity(this.state.activity);
    this.state.memory.clear();
  }

  /**
   * Spend concentration on the activity's scent: strengthen the marker on this tile,
   * or claim a new one.
   */
  private reinforceTrail(center: CenterTile): void {
    this.state.concentration = decreaseBy(this.state.concentration, this.params.concentrationDecay);
    const concentration = this.state.concentration;
    const scent = scentOf(this.state.activity);

    const existing = center.trail(scent);
    if (existing) {
      // Positive feedback on the way home
      const bonus = scent === Scent.COLONY ? Math.floor(existing.strength * this.params.reinforcementRatio) : 0;
      center.reinforce(existing, concentration + bonus);
      return;
    }

    if (concentration > 0) {
      this.communal = center.all('ant').some((ant) => ant.entity !== this.entity);
      this.state.offspring.push({ scent, location: this.location, strength: concentration });
    }
  }

  /**
   * Wipe a goal-scent marker that is a local maximum away from the goal.
   */
  private suppressTrail({ center, ring }: Neighborhood): void {
    const goal = targetKindOf(this.state.activity);
    if (center.has(goal) || ring.some((tile) => tile.has(goal))) return;

    const goalScent = targetScentOf(this.state.activity);
    const marker = center.trail(goalScent);
    if (!marker) return;

    const strongestNearby = ring.reduce((best, tile) => Math.max(best, tile.trail(goalScent)?.strength ?? 0), 0);
    if (marker.strength > strongestNearby) {
      center.clear(marker);
    }
  }

  private move(neighborhood: Neighborhood): void {
    const goal = targetKindOf(this.state.activity);

    const visibleGoal = neighborhood.ring.find((tile) => tile.has(goal));
    if (visibleGoal) {
      this.moveTo(visibleGoal);
      return;
    }

    const scented = this.strongestUnvisited(neighborhood.ring);
    if (scented) {
      this.moveTo(scented);
      return;
    }

    if (this.state.activity === Activity.CARRYING || this.isLost(neighborhood.center)) {
      this.headHome();
      return;
    }

    this.wander(neighborhood.ring);
  }

  /**
   * Unvisited ring tile with the strongest goal-scent marker.
   * Ties go to the later tile in ring order.
   */
  private strongestUnvisited(ring: readonly RingTile[]): RingTile | undefined {
    const goalScent = targetScentOf(this.state.activity);
    let best: RingTile | undefined;
    let bestStrength = -1;

    for (const tile of ring) {
      if (this.state.memory.contains(tile.location)) continue;
      const marker = tile.trail(goalScent);
      if (marker && marker.strength >= bestStrength) {
        best = tile;
        bestStrength = marker.strength;
      }
    }
    return best;
  }

  private isLost(center: CenterTile): boolean {
    return this.state.concentration === 0 && !center.has('trail');
  }

  /**
   * Step towards a random point on the ring around the nest at a random
   * distance below the Manhattan distance to it. The aim sharpens near home.
   */
  private headHome(): void {
    const { dimension, boundary } = this.params;
    const nest = this.state.nest;

    const radius = randInt(this.rng, 0, manhattan(this.location, nest));
    const offset = randItem(this.rng, ringOffsets(radius)) ?? { x: 0, y: 0 };
    const aim = applyBoundary({ x: nest.x + offset.x, y: nest.y + offset.y }, dimension, boundary);

    this.setLocation(stepTowards(this.location, aim, dimension, boundary));
  }

  /**
   * Random unvisited ring tile, or any random step (possibly none) when all are remembered.
   */
  private wander(ring: readonly RingTile[]): void {
    const unvisited = shuffled(this.rng, ring).find((tile) => !this.state.memory.contains(tile.location));
    if (unvisited) {
      this.moveTo(unvisited);
      return;
    }

    const offset = { x: randInt(this.rng, -1, 2), y: randInt(this.rng, -1, 2) };
    this.setLocation(translate(this.location, offset, this.params.dimension, this.params.boundary));
  }

  private moveTo(tile: RingTile): void {
    this.setLocation(translate(this.location, tile.offset, this.params.dimension, this.params.boundary));
  }

  private setLocation(location: Location): void {
    this.position.x = location.x;
    this.position.y = location.y;
  }
}
