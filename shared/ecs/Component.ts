// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - a typed Map wrapper holding one component type.
 * Iteration follows insertion order, which for a fresh world is entity id order.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  /**
   * Set component data for an entity, overwriting any previous value.
   */
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  entries(): IterableIterator<[EntityId, T]> {
    return this.data.entries();
  }

  keys(): IterableIterator<EntityId> {
    return this.data.keys();
  }

  get size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }
}
