/**
 * Small deterministic PRNG (mulberry32) for seeded self-play and tests.
 * Not suitable for anything security-related.
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max). */
  nextInt(min: number, max: number): number {
    if (!(max > min)) {
      throw new RangeError(`nextInt requires max > min (got ${min}, ${max})`);
    }
    return min + Math.floor(this.next() * (max - min));
  }

  /** Uniformly chosen element; throws on an empty list. */
  pick<T>(items: ReadonlyArray<T>): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.nextInt(0, items.length)];
  }
}
