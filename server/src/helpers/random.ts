// ============================================
// Random Helpers
// Injectable random source so AI and arena setup can be replayed under test
// ============================================

/**
 * Returns a float in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Seeded PRNG (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Float uniformly drawn from [min, max).
 */
export function randomUniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/**
 * Integer uniformly drawn from [min, max], both ends inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
