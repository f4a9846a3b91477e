// ============================================
// ECS Core Types
// ============================================

import type { ComponentMap } from './components';

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to. Allocated in increasing order,
 * so ids double as a stable processing order.
 */
export type EntityId = number;

/**
 * Component type identifier - one key per component interface.
 */
export type ComponentType = keyof ComponentMap;

/**
 * Standard component types used throughout the ECS.
 */
export const Components = {
  Position: 'Position',
  Lifespan: 'Lifespan', // Trail strength and morsel supply share this
  Ant: 'Ant',
  Nest: 'Nest',
  Morsel: 'Morsel',
  Trail: 'Trail',
} as const satisfies Record<ComponentType, ComponentType>;

/**
 * Entity tags for quick kind identification.
 */
export const Tags = {
  Ant: 'ant',
  Nest: 'nest',
  Morsel: 'morsel',
  Trail: 'trail',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];

// ============================================
// Resource Keys
// ============================================

/**
 * Singleton data not tied to entities.
 */
export interface ResourceMap {
  generation: number; // Current tick, 0 before the first step
}

export const Resources = {
  Generation: 'generation',
} as const satisfies Record<string, keyof ResourceMap>;
