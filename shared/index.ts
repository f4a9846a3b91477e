// ============================================
// Shared Types & Helpers
// Used by the server and by viewers
// ============================================

// ECS Module - Entity Component System
export * from './ecs';

// Grid geometry (locations, rings, boundary policies)
export * from './grid';

// Seeded random source
export * from './rand';

// Visited-location memory
export * from './memory';

// Fixed constants
export * from './constants';

// Type definitions (Activity, Scent, tile entities)
export * from './types';

// Network message types (Server -> viewer)
export * from './messages';
