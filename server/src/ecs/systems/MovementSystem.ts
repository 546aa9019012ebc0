// ============================================
// Movement System
// ============================================

import { Components } from '@asteroid-tap/shared';
import type { System } from './types';
import type { SystemContext } from './SystemContext';

/**
 * MovementSystem - linear integration of every entity with a Transform and
 * a Velocity. Velocities are per second; deltaMs is converted here.
 */
export class MovementSystem implements System {
  readonly name = 'MovementSystem';

  update(context: SystemContext, deltaMs: number): void {
    const { world } = context;
    const seconds = deltaMs / 1000;

    for (const entity of world.query(Components.Transform, Components.Velocity)) {
      const transform = world.getComponent(entity, Components.Transform);
      const velocity = world.getComponent(entity, Components.Velocity);
      if (!transform || !velocity) continue;

      transform.x += velocity.vx * seconds;
      transform.y += velocity.vy * seconds;
      transform.rotation += velocity.angularVelocity * seconds;
    }
  }
}
