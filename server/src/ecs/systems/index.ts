// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';

// Runner
export { SystemRunner } from './SystemRunner';

// Agent Systems
export { ForagingSystem } from './ForagingSystem';

// Lifecycle Systems
export { DecaySystem } from './DecaySystem';

// Network Systems
export { NetworkBroadcastSystem } from './NetworkBroadcastSystem';
