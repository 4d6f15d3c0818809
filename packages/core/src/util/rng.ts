// Seeded RNG utilities for reproducible passphrase samples

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(salt), never 0
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number, salt = '') {
    const x = ((seed >>> 0) ^ fnv1a32(salt)) >>> 0;
    // Zero is a fixed point of xorshift
    this.x = x === 0 ? 0x9e3779b9 : x;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }

  /** Bound as a {@link RandomSource}. */
  asSource(): RandomSource {
    return () => this.nextFloat01();
  }
}

/** Uniform index in [0, bound) drawn from `random`. */
export function pickIndex(bound: number, random: RandomSource): number {
  const index = Math.floor(random() * bound);
  // Guard against sources that return exactly 1
  return Math.min(index, bound - 1);
}
