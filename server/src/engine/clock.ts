// ============================================
// Clocks
// ============================================

/**
 * Monotonic millisecond time source. The epoch is arbitrary; only
 * differences matter.
 */
export interface Clock {
  nowMs(): number;
}

/**
 * Process clock backed by performance.now().
 */
export const systemClock: Clock = {
  nowMs: () => performance.now(),
};

/**
 * Clock that only moves when told to. Used for deterministic replays and
 * tests.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  nowMs(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
