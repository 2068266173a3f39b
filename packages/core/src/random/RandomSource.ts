/**
 * Source of uniform randomness for shuffling.
 * Each simulator run owns one; sources are never shared between runs.
 */
export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;

  /** Integer in [0, bound) */
  nextInt(bound: number): number;
}

/** Wrap any `() => number` generator producing floats in [0, 1) */
export function createRandomSource(generator: () => number): RandomSource {
  return {
    next: generator,
    nextInt(bound: number): number {
      return Math.floor(generator() * bound);
    }
  };
}

/** Non-reproducible source backed by Math.random */
export function defaultRandomSource(): RandomSource {
  return createRandomSource(Math.random);
}

/**
 * Seeded random number generator (mulberry32)
 * Produces deterministic sequence for reproducible simulations
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed;
  return createRandomSource(function() {
    state |= 0;
    state = state + 0x6D2B79F5 | 0;
    let t = Math.imul(state ^ state >>> 15, 1 | state);
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  });
}

export function randomSourceFor(seed?: number): RandomSource {
  return seed !== undefined ? seededRandom(seed) : defaultRandomSource();
}
