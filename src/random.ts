/** Returns floats in [0, 1). */
export type RandomSource = () => number;

/**
 * mulberry32: small, fast, and fully determined by its 32-bit seed.
 * Each call returns an independent generator with its own state.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
