// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import { InvalidEntityError, MissingRequiredComponentError } from './errors';
import {
  entityGeneration,
  entitySlot,
  makeEntityId,
  SLOT_CAPACITY,
  type ComponentSchema,
  type EntityId,
} from './types';

type StoreMap<S extends ComponentSchema> = { [K in keyof S]?: ComponentStore<S[K]> };

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, remove) with generation-checked ids
 * - Component storage (attach, get, remove), one store per component type
 * - Queries (find entities holding a set of component types)
 *
 * The schema parameter S ties each component type name to its data shape,
 * so getComponent(entity, 'Transform') is typed without casts.
 */
export class World<S extends ComponentSchema> {
  // Current generation per slot. A slot is live when alive[slot] is true.
  private generations: number[] = [];
  private alive: boolean[] = [];
  private freeSlots: number[] = [];
  private liveCount = 0;

  private stores: StoreMap<S> = {};
  private allStores: Array<{ type: string; store: ComponentStore<unknown> }> = [];

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Create a new entity. The returned id has never been issued before.
   */
  createEntity(): EntityId {
    let slot = this.freeSlots.shift();
    if (slot === undefined) {
      slot = this.generations.length;
      if (slot >= SLOT_CAPACITY) {
        throw new RangeError(`World is full (${SLOT_CAPACITY} live entities)`);
      }
      this.generations.push(1);
      this.alive.push(false);
    }
    this.alive[slot] = true;
    this.liveCount++;
    return makeEntityId(slot, this.generations[slot]);
  }

  /**
   * Remove an entity and every component attached to it.
   * Returns false if the entity was already gone.
   */
  removeEntity(entity: EntityId): boolean {
    if (!this.hasEntity(entity)) return false;

    for (const { store } of this.allStores) {
      store.delete(entity);
    }

    const slot = entitySlot(entity);
    this.alive[slot] = false;
    this.generations[slot]++;
    this.freeSlots.push(slot);
    this.liveCount--;
    return true;
  }

  hasEntity(entity: EntityId): boolean {
    if (!Number.isInteger(entity) || entity < 0) return false;
    const slot = entitySlot(entity);
    return this.alive[slot] === true && this.generations[slot] === entityGeneration(entity);
  }

  get entityCount(): number {
    return this.liveCount;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Attach a component to an entity, replacing any existing one of the same
   * type. Throws InvalidEntityError if the entity is not live.
   */
  attachComponent<K extends keyof S>(entity: EntityId, type: K, data: S[K]): void {
    if (!this.hasEntity(entity)) {
      throw new InvalidEntityError(entity, `attachComponent(${String(type)})`);
    }
    this.storeFor(type).set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if the entity doesn't have it or no longer exists.
   */
  getComponent<K extends keyof S>(entity: EntityId, type: K): S[K] | undefined {
    return this.stores[type]?.get(entity);
  }

  /**
   * Get a component that must exist. Throws MissingRequiredComponentError.
   */
  requireComponent<K extends keyof S>(entity: EntityId, type: K): S[K] {
    const component = this.getComponent(entity, type);
    if (component === undefined) {
      throw new MissingRequiredComponentError(entity, String(type));
    }
    return component;
  }

  hasComponent(entity: EntityId, type: keyof S): boolean {
    return this.stores[type]?.has(entity) ?? false;
  }

  /**
   * Detach one component. Returns whether it was present.
   * Throws InvalidEntityError if the entity is not live.
   */
  removeComponent(entity: EntityId, type: keyof S): boolean {
    if (!this.hasEntity(entity)) {
      throw new InvalidEntityError(entity, `removeComponent(${String(type)})`);
    }
    return this.stores[type]?.delete(entity) ?? false;
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Query: all live entities holding ALL of the given component types.
   *
   * Example: world.query('Transform', 'Velocity')
   *
   * The result is a fresh array, so removing entities while iterating it is
   * safe; removals are still best collected and applied after the loop.
   * With no types, returns every live entity.
   */
  query(...types: Array<keyof S>): EntityId[] {
    if (types.length === 0) return this.allEntities();

    let smallest: ComponentStore<unknown> | undefined;
    for (const type of types) {
      const store = this.stores[type];
      if (!store) return [];
      if (!smallest || store.size < smallest.size) smallest = store;
    }
    if (!smallest) return [];

    return smallest
      .entityIds()
      .filter((entity) => types.every((type) => this.hasComponent(entity, type)));
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Debug: entity count and per-store sizes.
   */
  getStats(): { entities: number; stores: Record<string, number> } {
    const stores: Record<string, number> = {};
    for (const { type, store } of this.allStores) {
      stores[type] = store.size;
    }
    return { entities: this.liveCount, stores };
  }

  private allEntities(): EntityId[] {
    const result: EntityId[] = [];
    for (let slot = 0; slot < this.alive.length; slot++) {
      if (this.alive[slot]) result.push(makeEntityId(slot, this.generations[slot]));
    }
    return result;
  }

  private storeFor<K extends keyof S>(type: K): ComponentStore<S[K]> {
    const existing = this.stores[type];
    if (existing) return existing;
    const created = new ComponentStore<S[K]>();
    this.stores[type] = created;
    this.allStores.push({ type: String(type), store: created });
    return created;
  }
}
