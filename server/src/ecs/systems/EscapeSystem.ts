// ============================================
// Escape System
// Asteroids that left the play area
// ============================================

import { Components, type EntityId } from '@asteroid-tap/shared';
import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { requireRunStats } from '../factories';

/**
 * EscapeSystem - removes every asteroid whose centre is outside the play
 * rectangle grown by its escape padding on any side, and counts it as
 * escaped.
 *
 * Runs before HitSystem so an escaped asteroid cannot be credited as a hit
 * in the same tick. Escapes do not re-roll the spawn cooldown.
 */
export class EscapeSystem implements System {
  readonly name = 'EscapeSystem';

  update(context: SystemContext): void {
    const { world, config } = context;
    const escaped: EntityId[] = [];

    for (const entity of world.query(Components.AsteroidTag, Components.Transform, Components.EscapeBounds)) {
      const transform = world.getComponent(entity, Components.Transform);
      const bounds = world.getComponent(entity, Components.EscapeBounds);
      if (!transform || !bounds) continue;

      const outside =
        transform.x < -bounds.padding ||
        transform.x > config.width + bounds.padding ||
        transform.y < -bounds.padding ||
        transform.y > config.height + bounds.padding;
      if (outside) escaped.push(entity);
    }

    if (escaped.length === 0) return;

    const stats = requireRunStats(world, context.runEntity);
    for (const entity of escaped) {
      if (world.removeEntity(entity)) {
        stats.escaped++;
        context.bus.publish({ type: 'asteroidEscaped', entity });
      }
    }
  }
}
