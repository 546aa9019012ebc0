// ============================================
// ECS Systems - Exports
// ============================================

export type { System } from './types';
export { SystemPriority } from './types';
export type { SystemContext } from './SystemContext';
export { SystemRunner } from './SystemRunner';

export { DifficultySystem, computeDifficultyMultiplier, baseMultiplier } from './DifficultySystem';
export { SpawnSystem } from './SpawnSystem';
export { MovementSystem } from './MovementSystem';
export { EscapeSystem } from './EscapeSystem';
export { HitSystem } from './HitSystem';
export { StatsSystem, createStatsSnapshot } from './StatsSystem';
export { RenderSystem, buildRenderFrame, publishRenderFrame, uiStateFor } from './RenderSystem';

import { SystemRunner } from './SystemRunner';
import { SystemPriority } from './types';
import { DifficultySystem } from './DifficultySystem';
import { SpawnSystem } from './SpawnSystem';
import { MovementSystem } from './MovementSystem';
import { EscapeSystem } from './EscapeSystem';
import { HitSystem } from './HitSystem';
import { StatsSystem } from './StatsSystem';
import { RenderSystem } from './RenderSystem';

/**
 * The Classic pipeline, in tick order.
 */
export function createClassicSystemRunner(): SystemRunner {
  const runner = new SystemRunner();
  runner.register(new DifficultySystem(), SystemPriority.DIFFICULTY);
  runner.register(new SpawnSystem(), SystemPriority.SPAWN);
  runner.register(new MovementSystem(), SystemPriority.MOVEMENT);
  runner.register(new EscapeSystem(), SystemPriority.ESCAPE);
  runner.register(new HitSystem(), SystemPriority.HIT);
  runner.register(new StatsSystem(), SystemPriority.STATS);
  runner.register(new RenderSystem(), SystemPriority.RENDER);
  return runner;
}
