// ============================================
// Location Awareness
// Fixed-capacity recency memory of visited tiles
// ============================================

import { sameLocation } from './grid';
import type { Location } from './types';

/**
 * Ring buffer of the last `capacity` locations an ant visited.
 * Once full, each insert overwrites the oldest slot.
 */
export class LocationAwareness {
  private readonly slots: Array<Location | null>;
  private next = 0;

  constructor(readonly capacity: number) {
    this.slots = new Array<Location | null>(capacity).fill(null);
  }

  /**
   * Record a location in place of the oldest one.
   * No-op with zero capacity.
   */
  insert(location: Location): void {
    if (this.capacity === 0) return;
    this.slots[this.next] = { x: location.x, y: location.y };
    this.next = (this.next + 1) % this.capacity;
  }

  contains(location: Location): boolean {
    return this.slots.some((slot) => slot !== null && sameLocation(slot, location));
  }

  /**
   * Forget every location
   */
  clear(): void {
    this.slots.fill(null);
    this.next = 0;
  }

  /**
   * Number of occupied slots
   */
  get size(): number {
    return this.slots.filter((slot) => slot !== null).length;
  }
}
