// ============================================
// ECS World
// ============================================

import type {
  EntityId,
  ComponentMap,
  ComponentType,
  ResourceMap,
  ResourceKey,
  Tag,
} from './types';

type ComponentStores = { [K in ComponentType]?: Map<EntityId, ComponentMap[K]> };
type ResourceSlots = { [K in ResourceKey]?: ResourceMap[K] };

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, destroy)
 * - Component storage (add, get, has), typed through ComponentMap
 * - Tags (lightweight entity classification)
 * - Resources (singletons such as the tick clock and arena bounds)
 *
 * Iteration order is insertion order everywhere: entities created first are
 * visited first. The movement resolver relies on that for blocker order.
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores: ComponentStores = {};
  private storeRemovers: Array<(entity: EntityId) => void> = [];
  private entityTags = new Map<EntityId, Set<Tag>>();
  private resources: ResourceSlots = {};

  // ============================================
  // Entity Lifecycle
  // ============================================

  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity and all its components.
   * Removes from all component stores and clears tags.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.has(id)) return;

    this.entities.delete(id);
    for (const remove of this.storeRemovers) {
      remove(id);
    }
    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Store for a component type, created on first use.
   */
  private storeFor<K extends ComponentType>(type: K): Map<EntityId, ComponentMap[K]> {
    const existing: Map<EntityId, ComponentMap[K]> | undefined = this.stores[type];
    if (existing) return existing;

    const created = new Map<EntityId, ComponentMap[K]>();
    const stores: { [P in K]?: Map<EntityId, ComponentMap[P]> } = this.stores;
    stores[type] = created;
    this.storeRemovers.push((entity) => created.delete(entity));
    return created;
  }

  /**
   * Add a component to an entity. Overwrites existing data.
   * Throws if the entity doesn't exist - components on dead ids are always a bug.
   */
  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    if (!this.entities.has(entity)) {
      throw new Error(`Cannot add ${type} to unknown entity ${entity}`);
    }
    this.storeFor(type).set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    const store: Map<EntityId, ComponentMap[K]> | undefined = this.stores[type];
    return store?.get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.stores[type]?.has(entity) ?? false;
  }

  // ============================================
  // Tags (lightweight entity classification)
  // ============================================

  addTag(entity: EntityId, tag: Tag): void {
    const tags = this.entityTags.get(entity);
    if (tags) {
      tags.add(tag);
    } else {
      this.entityTags.set(entity, new Set([tag]));
    }
  }

  /**
   * Get all entities with a specific tag, in creation order.
   */
  getEntitiesWithTag(tag: Tag): EntityId[] {
    const result: EntityId[] = [];
    for (const entity of this.entities) {
      if (this.entityTags.get(entity)?.has(tag)) {
        result.push(entity);
      }
    }
    return result;
  }

  /**
   * Iterate entities with tag via callback.
   * Works on a copy, so the callback may destroy entities.
   */
  forEachWithTag(tag: Tag, callback: (entity: EntityId) => void): void {
    for (const entity of this.getEntitiesWithTag(tag)) {
      callback(entity);
    }
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  setResource<K extends ResourceKey>(key: K, value: ResourceMap[K]): void {
    this.resources[key] = value;
  }

  getResource<K extends ResourceKey>(key: K): ResourceMap[K] | undefined {
    return this.resources[key];
  }
}
