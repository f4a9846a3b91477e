// ============================================
// Grid Geometry
// Pure functions over tile coordinates
// ============================================

import type { BoundaryPolicy, Dimension, Location, Offset } from './types';

/**
 * Key used to index tiles in maps ("x,y")
 */
export function tileKey(location: Location): string {
  return `${location.x},${location.y}`;
}

export function sameLocation(a: Location, b: Location): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInside(location: Location, dimension: Dimension): boolean {
  return location.x >= 0 && location.y >= 0 && location.x < dimension.x && location.y < dimension.y;
}

/**
 * Manhattan (taxicab) distance, measured on the raw coordinates
 */
export function manhattan(a: Location, b: Location): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * All offsets at exactly Chebyshev distance `radius` from the origin,
 * in row-major order (top row left to right, then the sides, then the bottom row).
 * Radius 0 yields the single zero offset.
 */
export function ringOffsets(radius: number): Offset[] {
  if (radius <= 0) return [{ x: 0, y: 0 }];

  const offsets: Offset[] = [];
  for (let y = -radius; y <= radius; y++) {
    for (let x = -radius; x <= radius; x++) {
      if (Math.max(Math.abs(x), Math.abs(y)) === radius) {
        offsets.push({ x, y });
      }
    }
  }
  return offsets;
}

// Euclidean modulo (always non-negative)
function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

function clamp(value: number, size: number): number {
  return Math.max(0, Math.min(size - 1, value));
}

/**
 * Normalize a location that may lie outside the grid according to the boundary policy
 */
export function applyBoundary(location: Location, dimension: Dimension, policy: BoundaryPolicy): Location {
  if (policy === 'wrap') {
    return { x: wrap(location.x, dimension.x), y: wrap(location.y, dimension.y) };
  }
  return { x: clamp(location.x, dimension.x), y: clamp(location.y, dimension.y) };
}

/**
 * Translate a location by an offset
 */
export function translate(
  location: Location,
  offset: Offset,
  dimension: Dimension,
  policy: BoundaryPolicy
): Location {
  return applyBoundary({ x: location.x + offset.x, y: location.y + offset.y }, dimension, policy);
}

/**
 * Move a single step towards a destination.
 * Each axis moves by the sign of the raw coordinate difference (at most one unit).
 */
export function stepTowards(
  from: Location,
  to: Location,
  dimension: Dimension,
  policy: BoundaryPolicy
): Location {
  const offset = { x: Math.sign(to.x - from.x), y: Math.sign(to.y - from.y) };
  return translate(from, offset, dimension, policy);
}
