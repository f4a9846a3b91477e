// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { Activity, Location, Role, Scent } from '../types';
import type { LocationAwareness } from '../memory';

/**
 * Position - the tile an entity occupies.
 * Used by: Ants, Nest, Morsels, Trails
 */
export interface PositionComponent {
  x: number;
  y: number;
}

/**
 * Lifespan - remaining life in ticks.
 * Trails: scent strength, decays by one per tick.
 * Morsels: remaining food supply, one unit per pickup.
 */
export interface LifespanComponent {
  remaining: number;
}

/**
 * A trail marker an ant wants to leave this tick.
 * Drained by the foraging system after every ant reacted.
 */
export interface TrailSpawn {
  scent: Scent;
  location: Location;
  strength: number;
}

/**
 * Ant - the foraging agent.
 */
export interface AntComponent {
  activity: Activity;
  role: Role; // Reset to follower at the start of every tick
  concentration: number; // Pheromone budget left, saturates at 0
  nest: Location;
  scope: number; // Sensing radius, in tiles
  memory: LocationAwareness;
  offspring: TrailSpawn[];
}

/**
 * Nest - where the colony stores food.
 */
export interface NestComponent {
  storage: number;
}

/**
 * Morsel - a finite food source. Remaining supply lives in Lifespan.
 */
export interface MorselComponent {
  initialSupply: number;
}

/**
 * Trail - a scent marker. Strength lives in Lifespan.
 */
export interface TrailComponent {
  scent: Scent;
  bornAt: number; // Generation that spawned it (not aged that tick)
}

/**
 * Component type -> data shape
 */
export interface ComponentMap {
  Position: PositionComponent;
  Lifespan: LifespanComponent;
  Ant: AntComponent;
  Nest: NestComponent;
  Morsel: MorselComponent;
  Trail: TrailComponent;
}
