// ============================================
// Concentration Budget
// Unsigned 16-bit pheromone budget, saturating at both ends
// ============================================

import { COLONY_CONSTANTS } from '#shared';

export function clampConcentration(value: number): number {
  return Math.max(0, Math.min(COLONY_CONSTANTS.MAX_CONCENTRATION, Math.floor(value)));
}

/**
 * Subtract `amount`, never going below zero
 */
export function decreaseBy(concentration: number, amount: number): number {
  return clampConcentration(concentration - amount);
}
