// ============================================
// Hit System
// Buffered pointer taps vs. the live asteroid
// ============================================

import { Components, HIT_PARTICLE_KIND, type EntityId, type PointerDownEvent } from '@asteroid-tap/shared';
import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { requireRunStats } from '../factories';
import { rollSpawnCooldown } from '../../helpers/spawning';
import type { ClassicWorld } from '../types';

function findAsteroidAt(world: ClassicWorld, pointer: PointerDownEvent): EntityId | undefined {
  for (const entity of world.query(Components.AsteroidTag, Components.Transform, Components.ColliderCircle)) {
    const transform = world.getComponent(entity, Components.Transform);
    const collider = world.getComponent(entity, Components.ColliderCircle);
    if (!transform || !collider) continue;

    const dx = pointer.x - transform.x;
    const dy = pointer.y - transform.y;
    if (dx * dx + dy * dy <= collider.radius * collider.radius) {
      return entity;
    }
  }
  return undefined;
}

/**
 * HitSystem - drains every pointer tap buffered since the previous tick.
 *
 * A tap inside an asteroid's collider destroys it, scores, and re-rolls the
 * spawn cooldown; any other tap is a miss. With one asteroid alive at most,
 * at most one tap per tick can hit.
 */
export class HitSystem implements System {
  readonly name = 'HitSystem';

  update(context: SystemContext): void {
    if (context.pendingPointers.length === 0) return;

    const { world, bus, config } = context;
    const stats = requireRunStats(world, context.runEntity);
    const pointers = context.pendingPointers.splice(0);

    for (const pointer of pointers) {
      const target = findAsteroidAt(world, pointer);

      if (target !== undefined && world.removeEntity(target)) {
        stats.hits++;
        stats.score += config.scorePerHit;
        stats.spawnCooldown = rollSpawnCooldown(context.rng, config);
        bus.publish({ type: 'asteroidDestroyed', entity: target, x: pointer.x, y: pointer.y });
        bus.publish({ type: 'particlesRequested', x: pointer.x, y: pointer.y, kind: HIT_PARTICLE_KIND });
        continue;
      }

      stats.misses++;
      bus.publish({ type: 'hitMissed', x: pointer.x, y: pointer.y, timestampMs: pointer.timestampMs });
    }
  }
}
