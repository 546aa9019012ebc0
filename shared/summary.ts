// ============================================
// Result Summaries
// Derived numbers the start screen and HUD display
// ============================================

import type { LastResult, RunStatsSnapshot } from './types';

export interface LastResultSummary {
  destroyed: number;
  escaped: number;
  clicks: number;
  accuracyPct: number;
  seconds: number;
}

export function summarizeLastResult(result: LastResult): LastResultSummary {
  const clicks = result.hits + result.misses;
  return {
    destroyed: result.hits,
    escaped: result.escaped,
    clicks,
    accuracyPct: clicks === 0 ? 0 : Math.round((result.hits / clicks) * 100),
    seconds: Math.floor(result.timeMs / 1000),
  };
}

/**
 * One-line HUD text, e.g. "Destroyed 3 | Miss 1 | Time 42s"
 */
export function formatHud(snapshot: RunStatsSnapshot): string {
  return `Destroyed ${snapshot.hits} | Miss ${snapshot.misses} | Time ${Math.floor(snapshot.timeMs / 1000)}s`;
}
