// ============================================
// Stats System
// ============================================

import type { RunStatsComponent, RunStatsSnapshot } from '@asteroid-tap/shared';
import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { requireRunStats } from '../factories';

export function createStatsSnapshot(stats: RunStatsComponent, paused: boolean): RunStatsSnapshot {
  return Object.freeze({
    spawned: stats.spawned,
    escaped: stats.escaped,
    hits: stats.hits,
    misses: stats.misses,
    score: stats.score,
    difficultyMultiplier: stats.difficultyMultiplier,
    timeMs: stats.elapsed,
    paused,
  });
}

/**
 * StatsSystem - publishes an immutable copy of the run counters.
 */
export class StatsSystem implements System {
  readonly name = 'StatsSystem';

  update(context: SystemContext): void {
    const stats = requireRunStats(context.world, context.runEntity);
    context.bus.publish({
      type: 'statsUpdated',
      snapshot: createStatsSnapshot(stats, context.lifecycle === 'paused'),
    });
  }
}
