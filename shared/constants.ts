// ============================================
// Colony Constants
// Fixed values that are not part of the runtime configuration
// ============================================

export const COLONY_CONSTANTS = {
  // Ants only sense the ring of tiles immediately around them
  SENSING_RADIUS: 1,

  // Pheromone budget is a 16-bit quantity
  MAX_CONCENTRATION: 0xffff,

  // Nest storage saturates instead of overflowing
  MAX_STORAGE: Number.MAX_SAFE_INTEGER,

  // Reinforced markers saturate so per-tick decay stays exact
  MAX_STRENGTH: Number.MAX_SAFE_INTEGER,
} as const;
