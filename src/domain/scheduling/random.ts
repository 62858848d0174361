/**
 * Seeded randomness
 *
 * Every random decision in a session (jitter, shuffles, choice order) draws
 * from one generator created from the session seed.
 */

/**
 * Generator returning floats in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Create a seeded random number generator (mulberry32)
 */
export function createSeededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw a fresh 32-bit seed from process randomness
 */
export function drawSeed(): number {
  return Math.floor(Math.random() * 2 ** 32);
}

/**
 * Uniform float in [min, max)
 */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
