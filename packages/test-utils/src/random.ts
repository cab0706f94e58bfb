/**
 * Seeded pseudo-random numbers for reproducible property tests
 */

/**
 * A generator of uniform floats in [0, 1)
 */
export type Rng = () => number;

/**
 * Create a mulberry32 generator from a 32-bit seed
 *
 * @example
 * const rng = createRng(42);
 * rng(); // same sequence on every run
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in the inclusive range [min, max]
 */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}
