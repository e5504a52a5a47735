/** Uniform float in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic generator (mulberry32) for reproducible selection in tests
 * and debugging. Same seed, same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, length). */
export function randomIndex(random: RandomSource, length: number): number {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`randomIndex: length must be a positive integer, got ${length}`);
  }
  // Guard against sources that return exactly 1
  return Math.min(Math.floor(random() * length), length - 1);
}
