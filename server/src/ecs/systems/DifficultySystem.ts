// ============================================
// Difficulty System
// Speed level + run time → difficulty multiplier
// ============================================

import {
  DIFFICULTY_STEP,
  DIFFICULTY_STEP_SECONDS,
  MAX_DIFFICULTY_MULTIPLIER,
  SPEED_LEVEL_MULTIPLIERS,
  clamp,
  clampSpeedLevel,
  type GameSettings,
} from '@asteroid-tap/shared';
import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { requireRunStats } from '../factories';

export function baseMultiplier(speedLevel: number): number {
  return SPEED_LEVEL_MULTIPLIERS[clampSpeedLevel(speedLevel) - 1];
}

/**
 * Multiplier for the given tunables after `elapsedMs` of run time.
 *
 * Without progression this is exactly the base. With progression it grows
 * by DIFFICULTY_STEP every DIFFICULTY_STEP_SECONDS whole seconds, capped at
 * MAX_DIFFICULTY_MULTIPLIER; a base already above the cap stays at the base.
 */
export function computeDifficultyMultiplier(settings: GameSettings, elapsedMs: number): number {
  const base = baseMultiplier(settings.speedLevel);
  if (!settings.difficultyProgression) {
    return base;
  }
  const wholeSeconds = Math.floor(elapsedMs / 1000);
  const steps = Math.floor(wholeSeconds / DIFFICULTY_STEP_SECONDS);
  return clamp(base + steps * DIFFICULTY_STEP, base, Math.max(base, MAX_DIFFICULTY_MULTIPLIER));
}

export class DifficultySystem implements System {
  readonly name = 'DifficultySystem';

  update(context: SystemContext): void {
    const stats = requireRunStats(context.world, context.runEntity);
    stats.difficultyMultiplier = computeDifficultyMultiplier(context.settings, stats.elapsed);
  }
}
