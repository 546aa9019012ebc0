// ============================================
// Spawn System
// Keeps exactly zero or one asteroid alive
// ============================================

import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { createAsteroid, hasAsteroid, requireRunStats } from '../factories';
import { randomSpawnX, rollSpawnCooldown } from '../../helpers/spawning';

/**
 * SpawnSystem - counts the spawn cooldown down and, once it is zero and no
 * asteroid exists, spawns one just above the top edge moving down at
 * baseAsteroidSpeed × difficultyMultiplier.
 *
 * At most one asteroid exists at any instant.
 */
export class SpawnSystem implements System {
  readonly name = 'SpawnSystem';

  update(context: SystemContext, deltaMs: number): void {
    const { world, config, rng } = context;
    const stats = requireRunStats(world, context.runEntity);

    if (stats.spawnCooldown > 0) {
      stats.spawnCooldown = Math.max(0, stats.spawnCooldown - deltaMs);
    }

    if (hasAsteroid(world) || stats.spawnCooldown > 0) return;

    const entity = createAsteroid(world, {
      x: randomSpawnX(rng, config),
      y: -config.asteroidRadius,
      speed: config.baseAsteroidSpeed * stats.difficultyMultiplier,
      angularVelocity: config.asteroidAngularVelocity,
      radius: config.asteroidRadius,
      escapePadding: config.escapePadding,
    });
    stats.spawned++;
    stats.spawnCooldown = rollSpawnCooldown(rng, config);

    context.bus.publish({ type: 'asteroidSpawned', entity });
  }
}
