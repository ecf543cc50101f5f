/** Uniform source returning values in `[0, 1)`. */
export type RandomSource = () => number;

const MAX_UNIT_SAMPLE = 0.999999;

/** Mulberry32 generator; identical seeds always replay the same sequence. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let result = Math.imul(state ^ (state >>> 15), 1 | state);
    result ^= result + Math.imul(result ^ (result >>> 7), 61 | result);
    return ((result ^ (result >>> 14)) >>> 0) / 0x1_0000_0000;
  };
}

/** Hash a string seed down to 32 bits so named runs can be replayed. */
export function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  h = Math.imul(h ^ (h >>> 16), 2246822507);
  h = Math.imul(h ^ (h >>> 13), 3266489909);
  return (h ^ (h >>> 16)) >>> 0;
}

/** Draw once and clamp into `[0, 1)`; non-finite samples count as 0. */
export function sampleUnit(random: RandomSource): number {
  const value = random();
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.min(MAX_UNIT_SAMPLE, value);
}

/**
 * Uniform integer in `[min, max]`, both inclusive. Always consumes exactly
 * one draw so traces stay aligned even for single-value ranges.
 */
export function randomInt(min: number, max: number, random: RandomSource): number {
  const low = Math.ceil(Math.min(min, max));
  const high = Math.floor(Math.max(min, max));
  const span = Math.max(1, high - low + 1);
  return low + Math.floor(sampleUnit(random) * span);
}
