// ============================================
// ECS World Unit Tests
// Entity lifecycle, component storage and queries
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { World } from '../ecs/World';
import { ComponentStore } from '../ecs/Component';
import { InvalidEntityError, MissingRequiredComponentError } from '../ecs/errors';
import { SLOT_CAPACITY, entityGeneration, entitySlot, makeEntityId } from '../ecs/types';
import type { ClassicComponents } from '../ecs/components';

describe('entity ids', () => {
  it('packs slot and generation', () => {
    const id = makeEntityId(5, 3);
    expect(entitySlot(id)).toBe(5);
    expect(entityGeneration(id)).toBe(3);
    expect(id).toBe(3 * SLOT_CAPACITY + 5);
  });
});

describe('World', () => {
  let world: World<ClassicComponents>;

  beforeEach(() => {
    world = new World<ClassicComponents>();
  });

  describe('entities', () => {
    it('issues distinct ids and counts live entities', () => {
      const a = world.createEntity();
      const b = world.createEntity();

      expect(a).not.toBe(b);
      expect(world.entityCount).toBe(2);
      expect(world.hasEntity(a)).toBe(true);
    });

    it('never issues a removed id again, even when its slot is reused', () => {
      const first = world.createEntity();
      world.removeEntity(first);

      const second = world.createEntity();

      expect(entitySlot(second)).toBe(entitySlot(first));
      expect(second).not.toBe(first);
      expect(world.hasEntity(first)).toBe(false);
    });

    it('reports whether removal did anything', () => {
      const entity = world.createEntity();

      expect(world.removeEntity(entity)).toBe(true);
      expect(world.removeEntity(entity)).toBe(false);
      expect(world.entityCount).toBe(0);
    });

    it('rejects ids it never issued', () => {
      expect(world.hasEntity(12345)).toBe(false);
      expect(world.hasEntity(-1)).toBe(false);
      expect(world.hasEntity(1.5)).toBe(false);
      expect(world.removeEntity(12345)).toBe(false);
    });
  });

  describe('components', () => {
    it('attaches and reads a component', () => {
      const entity = world.createEntity();
      world.attachComponent(entity, 'Transform', { x: 1, y: 2, rotation: 0 });

      expect(world.getComponent(entity, 'Transform')).toEqual({ x: 1, y: 2, rotation: 0 });
      expect(world.hasComponent(entity, 'Transform')).toBe(true);
      expect(world.getComponent(entity, 'Velocity')).toBeUndefined();
    });

    it('keeps one instance per type, replacing on re-attach', () => {
      const entity = world.createEntity();
      world.attachComponent(entity, 'ColliderCircle', { radius: 5 });
      world.attachComponent(entity, 'ColliderCircle', { radius: 9 });

      expect(world.getComponent(entity, 'ColliderCircle')).toEqual({ radius: 9 });
      expect(world.getStats().stores.ColliderCircle).toBe(1);
    });

    it('returns the stored object so systems can mutate it in place', () => {
      const entity = world.createEntity();
      world.attachComponent(entity, 'Transform', { x: 0, y: 0, rotation: 0 });

      world.requireComponent(entity, 'Transform').x = 42;

      expect(world.getComponent(entity, 'Transform')?.x).toBe(42);
    });

    it('throws InvalidEntityError when attaching to a dead entity', () => {
      const entity = world.createEntity();
      world.removeEntity(entity);

      expect(() => world.attachComponent(entity, 'AsteroidTag', {})).toThrow(InvalidEntityError);
      expect(() => world.removeComponent(entity, 'AsteroidTag')).toThrow(InvalidEntityError);
    });

    it('carries the offending id on InvalidEntityError', () => {
      try {
        world.attachComponent(777, 'AsteroidTag', {});
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidEntityError);
        expect(error instanceof InvalidEntityError && error.entity).toBe(777);
        expect(error instanceof Error && error.name).toBe('InvalidEntityError');
      }
    });

    it('throws MissingRequiredComponentError from requireComponent', () => {
      const entity = world.createEntity();

      expect(() => world.requireComponent(entity, 'RunStats')).toThrow(MissingRequiredComponentError);
    });

    it('returns undefined for a stale id after its slot is reused', () => {
      const stale = world.createEntity();
      world.attachComponent(stale, 'Transform', { x: 1, y: 1, rotation: 0 });
      world.removeEntity(stale);

      const fresh = world.createEntity();
      world.attachComponent(fresh, 'Transform', { x: 2, y: 2, rotation: 0 });

      expect(world.getComponent(stale, 'Transform')).toBeUndefined();
      expect(world.getComponent(fresh, 'Transform')).toEqual({ x: 2, y: 2, rotation: 0 });
    });

    it('removes every component with the entity', () => {
      const entity = world.createEntity();
      world.attachComponent(entity, 'Transform', { x: 0, y: 0, rotation: 0 });
      world.attachComponent(entity, 'Velocity', { vx: 0, vy: 1, angularVelocity: 0 });
      world.attachComponent(entity, 'AsteroidTag', {});

      world.removeEntity(entity);

      expect(world.getStats()).toEqual({
        entities: 0,
        stores: { Transform: 0, Velocity: 0, AsteroidTag: 0 },
      });
    });

    it('detaches a single component', () => {
      const entity = world.createEntity();
      world.attachComponent(entity, 'AsteroidTag', {});

      expect(world.removeComponent(entity, 'AsteroidTag')).toBe(true);
      expect(world.removeComponent(entity, 'AsteroidTag')).toBe(false);
      expect(world.hasEntity(entity)).toBe(true);
    });
  });

  describe('query', () => {
    it('returns entities holding all listed types', () => {
      const moving = world.createEntity();
      world.attachComponent(moving, 'Transform', { x: 0, y: 0, rotation: 0 });
      world.attachComponent(moving, 'Velocity', { vx: 1, vy: 0, angularVelocity: 0 });
      const still = world.createEntity();
      world.attachComponent(still, 'Transform', { x: 0, y: 0, rotation: 0 });

      expect(world.query('Transform', 'Velocity')).toEqual([moving]);
      expect(world.query('Transform').sort()).toEqual([moving, still].sort());
    });

    it('returns nothing for a type no entity has ever held', () => {
      world.createEntity();

      expect(world.query('RunStats')).toEqual([]);
    });

    it('returns every live entity without types', () => {
      const a = world.createEntity();
      const b = world.createEntity();
      world.removeEntity(a);

      expect(world.query()).toEqual([b]);
    });

    it('returns a snapshot that removals do not disturb', () => {
      const ids = [world.createEntity(), world.createEntity(), world.createEntity()];
      for (const id of ids) world.attachComponent(id, 'AsteroidTag', {});

      const result = world.query('AsteroidTag');
      for (const id of result) world.removeEntity(id);

      expect(result).toHaveLength(3);
      expect(world.query('AsteroidTag')).toEqual([]);
    });
  });
});

describe('ComponentStore', () => {
  it('swaps the last element into a removed hole', () => {
    const store = new ComponentStore<string>();
    const ids = [makeEntityId(0, 1), makeEntityId(1, 1), makeEntityId(2, 1)];
    ids.forEach((id, i) => store.set(id, `v${i}`));

    store.delete(ids[0]);

    expect(store.entityIds()).toEqual([ids[2], ids[1]]);
    expect(store.get(ids[2])).toBe('v2');
    expect(store.get(ids[0])).toBeUndefined();
    expect(store.size).toBe(2);
  });

  it('misses for an id of an older generation in the same slot', () => {
    const store = new ComponentStore<number>();
    store.set(makeEntityId(4, 2), 1);

    expect(store.has(makeEntityId(4, 1))).toBe(false);
    expect(store.delete(makeEntityId(4, 1))).toBe(false);
    expect(store.has(makeEntityId(4, 2))).toBe(true);
  });
});
