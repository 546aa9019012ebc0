// ============================================
// HitSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { HitSystem } from '../HitSystem';
import { getAsteroids, requireRunStats } from '../../factories';
import type { SystemContext } from '../SystemContext';
import { createTestAsteroid, createTestContext, pointer, recordEvents } from './testUtils';

describe('HitSystem', () => {
  let context: SystemContext;
  let system: HitSystem;

  beforeEach(() => {
    context = createTestContext();
    system = new HitSystem();
  });

  it('destroys the asteroid under the pointer and scores', () => {
    const events = recordEvents(context.bus, ['asteroidDestroyed', 'particlesRequested', 'hitMissed']);
    const asteroid = createTestAsteroid(context, { x: 180, y: 320 });
    context.pendingPointers.push(pointer(180, 320));

    system.update(context);

    const stats = requireRunStats(context.world, context.runEntity);
    expect(stats.hits).toBe(1);
    expect(stats.score).toBe(10);
    expect(stats.misses).toBe(0);
    expect(context.world.hasEntity(asteroid)).toBe(false);
    expect(events).toEqual([
      { type: 'asteroidDestroyed', entity: asteroid, x: 180, y: 320 },
      { type: 'particlesRequested', x: 180, y: 320, kind: 'asteroid-hit' },
    ]);
  });

  it('counts a tap exactly on the collider edge as a hit', () => {
    createTestAsteroid(context, { x: 180, y: 320 });
    context.pendingPointers.push(pointer(198, 320));

    system.update(context);

    expect(requireRunStats(context.world, context.runEntity).hits).toBe(1);
  });

  it('counts a tap outside the collider as a miss', () => {
    const events = recordEvents(context.bus, ['hitMissed']);
    const asteroid = createTestAsteroid(context, { x: 180, y: 320 });
    context.pendingPointers.push(pointer(199, 320, 42));

    system.update(context);

    const stats = requireRunStats(context.world, context.runEntity);
    expect(stats.misses).toBe(1);
    expect(stats.hits).toBe(0);
    expect(context.world.hasEntity(asteroid)).toBe(true);
    expect(events).toEqual([{ type: 'hitMissed', x: 199, y: 320, timestampMs: 42 }]);
  });

  it('re-rolls the spawn cooldown on a hit', () => {
    const stats = requireRunStats(context.world, context.runEntity);
    createTestAsteroid(context);
    context.pendingPointers.push(pointer(180, 320));

    system.update(context);

    expect(stats.spawnCooldown).toBeGreaterThanOrEqual(200);
    expect(stats.spawnCooldown).toBeLessThanOrEqual(500);
  });

  it('hits at most once per tick however many taps are buffered', () => {
    createTestAsteroid(context);
    context.pendingPointers.push(pointer(180, 320), pointer(180, 320), pointer(181, 321));

    system.update(context);

    const stats = requireRunStats(context.world, context.runEntity);
    expect(stats.hits).toBe(1);
    expect(stats.misses).toBe(2);
    expect(getAsteroids(context.world)).toHaveLength(0);
  });

  it('drains the buffer so no tap is processed twice', () => {
    context.pendingPointers.push(pointer(10, 10));

    system.update(context);
    system.update(context);

    expect(context.pendingPointers).toHaveLength(0);
    expect(requireRunStats(context.world, context.runEntity).misses).toBe(1);
  });

  it('does nothing without buffered taps', () => {
    const events = recordEvents(context.bus, ['hitMissed', 'asteroidDestroyed']);
    createTestAsteroid(context);

    system.update(context);

    expect(events).toEqual([]);
    expect(getAsteroids(context.world)).toHaveLength(1);
  });
});
