/**
 * Seedable randomness for fault filters.
 *
 * Filters take a RandomSource strategy so tests can substitute a scripted
 * sequence of draws.
 */

export interface RandomSource {
  /** Draw a float in [low, high) */
  uniform(low: number, high: number): number;
}

/**
 * mulberry32: small 32-bit PRNG, deterministic for a given seed.
 */
function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export class SeededRandom implements RandomSource {
  readonly seed: number;
  private next: () => number;

  constructor(seed: number = Date.now()) {
    this.seed = seed;
    this.next = mulberry32(seed);
  }

  uniform(low: number, high: number): number {
    return low + this.next() * (high - low);
  }
}
