// ============================================
// ECS System Types
// ============================================

import type { SystemContext } from './SystemContext';

/**
 * Base System interface
 * All Classic systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every running tick
   * @param context Shared run state (world, bus, rng, tunables)
   * @param deltaMs Clamped time since the previous tick in milliseconds
   */
  update(context: SystemContext, deltaMs: number): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * Escape runs before hit detection: an asteroid that has left the play area
 * this tick can no longer be hit.
 */
export const SystemPriority = {
  DIFFICULTY: 100,
  SPAWN: 200,
  MOVEMENT: 300,
  ESCAPE: 400,
  HIT: 500,
  STATS: 800,

  // Render snapshot - runs last
  RENDER: 900,
} as const;
