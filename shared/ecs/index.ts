// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, Tags, Resources } from './types';
export type { EntityId, ComponentType, Tag, ResourceMap } from './types';

// Component interfaces
export type {
  PositionComponent,
  LifespanComponent,
  AntComponent,
  NestComponent,
  MorselComponent,
  TrailComponent,
  TrailSpawn,
  ComponentMap,
} from './components';
