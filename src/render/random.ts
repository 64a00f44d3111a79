const UINT32_RANGE = 0x1_0000_0000;

export interface RandomSource {
  /** Next value in [0, 1). */
  next(): number;
}

/**
 * Seeded uniform generator (mulberry32). One instance is owned by the render
 * loop for the whole run and is never reseeded.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // Seeds derived from byte counters routinely exceed 32 bits; fold the high word in.
    const low = seed >>> 0;
    const high = Math.floor(seed / UINT32_RANGE) >>> 0;
    this.state = (low ^ Math.imul(high, 0x9e3779b9)) >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / UINT32_RANGE;
  }
}
