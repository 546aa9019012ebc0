// ============================================
// ECS System Runner
// Manages and executes all game systems in priority order
// ============================================

import type { System } from './types';
import type { SystemContext } from './SystemContext';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

// Ticks slower than this get a per-system breakdown in the perf log
const SLOW_TICK_MS = 10;

/**
 * SystemRunner - Manages and executes all game systems
 *
 * Systems are executed in priority order (lower numbers first). Equal
 * priorities keep registration order.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param system The system to register
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order.
   * A throwing system is logged and the error is rethrown: the rest of the
   * pipeline does not run on a broken world.
   */
  update(context: SystemContext, deltaMs: number): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(context, deltaMs);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        throw error;
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;

    if (totalMs > SLOW_TICK_MS) {
      // Sort by time descending to show slowest first
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.map((t) => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map((s) => `${s.system.name} (priority: ${s.priority})`);
  }
}
