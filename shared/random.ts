// ============================================
// Seeded Random
// ============================================

/**
 * Mulberry32 - small, fast, deterministic 32-bit PRNG.
 *
 * All gameplay randomness goes through this so that the same seed and the
 * same sequence of calls reproduce the same run.
 */
export class SeededRandom {
  private state: number;
  readonly seed: number;

  constructor(seed: number) {
    this.seed = seed | 0;
    this.state = this.seed;
  }

  /** Float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Float in [min, max) */
  nextFloat(min = 0, max = 1): number {
    return min + this.next() * (max - min);
  }

  /** Integer in [min, max], both inclusive */
  nextInt(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`nextInt: max (${max}) is below min (${min})`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  getState(): number {
    return this.state;
  }

  setState(state: number): void {
    this.state = state | 0;
  }
}

/**
 * Draw a fresh 31-bit seed from the platform's non-deterministic source.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 2 ** 31);
}
