// ============================================
// Component Store
// ============================================

import { entitySlot, type EntityId } from './types';

/**
 * ComponentStore - sparse-set storage for one component type.
 *
 * `sparse` maps a slot index to a position in the packed arrays; `entities`
 * and `data` are packed so iteration touches only entities that actually
 * hold the component. The full EntityId (slot + generation) is stored in
 * `entities`, so a lookup with a stale id misses even after the slot has
 * been reused.
 */
export class ComponentStore<T> {
  private sparse: number[] = [];
  private entities: EntityId[] = [];
  private data: T[] = [];

  /**
   * Set component data for an entity.
   * Overwrites existing data if present.
   */
  set(entity: EntityId, value: T): void {
    const index = this.indexOf(entity);
    if (index !== -1) {
      this.data[index] = value;
      return;
    }
    this.sparse[entitySlot(entity)] = this.entities.length;
    this.entities.push(entity);
    this.data.push(value);
  }

  /**
   * Get component data for an entity.
   * Returns undefined if entity doesn't have this component.
   */
  get(entity: EntityId): T | undefined {
    const index = this.indexOf(entity);
    return index === -1 ? undefined : this.data[index];
  }

  has(entity: EntityId): boolean {
    return this.indexOf(entity) !== -1;
  }

  /**
   * Remove component from entity. Swaps the last packed element into the
   * hole, so packed order is not insertion order after a removal.
   */
  delete(entity: EntityId): boolean {
    const index = this.indexOf(entity);
    if (index === -1) return false;

    const lastIndex = this.entities.length - 1;
    const lastEntity = this.entities[lastIndex];
    const lastData = this.data[lastIndex];
    if (index !== lastIndex && lastEntity !== undefined && lastData !== undefined) {
      this.entities[index] = lastEntity;
      this.data[index] = lastData;
      this.sparse[entitySlot(lastEntity)] = index;
    }
    this.entities.pop();
    this.data.pop();
    this.sparse[entitySlot(entity)] = -1;
    return true;
  }

  /**
   * Entity IDs holding this component, copied so callers may mutate the store
   * while iterating.
   */
  entityIds(): EntityId[] {
    return this.entities.slice();
  }

  get size(): number {
    return this.entities.length;
  }

  clear(): void {
    this.sparse = [];
    this.entities = [];
    this.data = [];
  }

  private indexOf(entity: EntityId): number {
    const index = this.sparse[entitySlot(entity)];
    if (index === undefined || index < 0) return -1;
    return this.entities[index] === entity ? index : -1;
  }
}
