// ============================================
// Shared Types & Interfaces
// Colony entities, enums, and type definitions
// ============================================

import type { EntityId } from './ecs/types';

// Tile coordinates on the grid (integers, origin at top-left)
export interface Location {
  x: number;
  y: number;
}

// Relative displacement between two tiles
export interface Offset {
  x: number;
  y: number;
}

// Grid size in tiles
export interface Dimension {
  x: number;
  y: number;
}

// What happens to a step that leaves the grid
// - wrap: the grid is a torus, coordinates wrap around
// - clamp: coordinates stop at the edge
export type BoundaryPolicy = 'wrap' | 'clamp';

// Persistent goal mode of an ant
export enum Activity {
  FORAGING = 'foraging', // Searching for food
  CARRYING = 'carrying', // Bringing a portion of food back to the nest
}

// What a trail marker signals
export enum Scent {
  COLONY = 'colony', // Leads home
  FOOD = 'food', // Leads to a food source
}

// Per-tick role used to settle which co-located ant writes a marker
export type Role = 'leader' | 'follower';

// Entity kinds an ant can target
export type TargetKind = 'nest' | 'morsel';

// All entity kinds living on the grid
export type EntityKind = 'ant' | 'nest' | 'morsel' | 'trail';

// ============================================
// Tile Entities
// Immutable per-tick views of whatever occupies a tile.
// Each variant carries exactly the payload its kind needs.
// ============================================

export interface AntOnTile {
  kind: 'ant';
  entity: EntityId;
  activity: Activity;
}

export interface NestOnTile {
  kind: 'nest';
  entity: EntityId;
  storage: number;
}

export interface MorselOnTile {
  kind: 'morsel';
  entity: EntityId;
  supply: number; // Remaining lifespan
}

export interface TrailOnTile {
  kind: 'trail';
  entity: EntityId;
  scent: Scent;
  strength: number; // Remaining lifespan
}

export type TileEntity = AntOnTile | NestOnTile | MorselOnTile | TrailOnTile;
