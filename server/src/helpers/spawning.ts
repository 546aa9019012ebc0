// ============================================
// Spawning Helpers
// ============================================

import type { ClassicConfig, SeededRandom } from '@asteroid-tap/shared';

/**
 * Next spawn cooldown in ms: the fixed override when configured, otherwise
 * a uniform integer draw from [min, max]. A degenerate range yields min.
 */
export function rollSpawnCooldown(rng: SeededRandom, config: ClassicConfig): number {
  if (config.spawnCooldownMs !== undefined) {
    return config.spawnCooldownMs;
  }
  const min = Math.round(config.spawnCooldownMinMs);
  const max = Math.round(config.spawnCooldownMaxMs);
  if (max <= min) {
    return min;
  }
  return min + rng.nextInt(0, max - min);
}

/**
 * Spawn x: uniform across the play width.
 */
export function randomSpawnX(rng: SeededRandom, config: ClassicConfig): number {
  return rng.nextFloat(0, config.width);
}
