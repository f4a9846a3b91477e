// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { ComponentMap } from './components';
import type { EntityId, ComponentType, ResourceMap, Tag } from './types';

type ComponentStores = { [K in ComponentType]: ComponentStore<ComponentMap[K]> };

function createStores(): ComponentStores {
  return {
    Position: new ComponentStore(),
    Lifespan: new ComponentStore(),
    Ant: new ComponentStore(),
    Nest: new ComponentStore(),
    Morsel: new ComponentStore(),
    Trail: new ComponentStore(),
  };
}

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle and id allocation
 * - Component storage, one typed store per component type
 * - Queries (find entities with specific components)
 * - Tags (entity kind classification)
 * - Resources (generation counter)
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores: ComponentStores = createStores();
  private entityTags = new Map<EntityId, Set<Tag>>();
  private resources: Partial<ResourceMap> = {};

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Create a new entity. Ids are unique and strictly increasing.
   */
  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity, its components and its tags.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.has(id)) return;

    this.entities.delete(id);
    for (const store of Object.values(this.stores)) {
      store.delete(id);
    }
    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Component Management
  // ============================================

  getStore<K extends ComponentType>(type: K): ComponentStore<ComponentMap[K]> {
    return this.stores[type];
  }

  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    if (!this.entities.has(entity)) {
      throw new Error(`Cannot add ${type} to unknown entity ${entity}`);
    }
    this.getStore(type).set(entity, data);
  }

  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    return this.getStore(type).get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.stores[type].has(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Entities with ALL specified components, in ascending id order.
   *
   * Example: world.query('Ant', 'Position')
   */
  query(...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];
    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }
    return result.sort((a, b) => a - b);
  }

  // ============================================
  // Tags
  // ============================================

  addTag(entity: EntityId, tag: Tag): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  /**
   * All entities with a specific tag, in ascending id order.
   */
  getEntitiesWithTag(tag: Tag): EntityId[] {
    const result: EntityId[] = [];
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        result.push(entity);
      }
    }
    return result.sort((a, b) => a - b);
  }

  /**
   * Iterate entities with a tag in ascending id order.
   */
  forEachWithTag(tag: Tag, callback: (entity: EntityId) => void): void {
    for (const entity of this.getEntitiesWithTag(tag)) {
      callback(entity);
    }
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  setResource<K extends keyof ResourceMap>(key: K, value: ResourceMap[K]): void {
    this.resources[key] = value;
  }

  getResource<K extends keyof ResourceMap>(key: K): ResourceMap[K] | undefined {
    return this.resources[key];
  }
}
