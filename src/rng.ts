/** Seedable random helpers for food placement and baseline agents. */

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/** FNV-1a 32-bit offset basis. */
const FNV_OFFSET_BASIS = 0x811c9dc5;
/** FNV-1a 32-bit prime. */
const FNV_PRIME = 0x01000193;

export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Mix one or more numbers into a 32-bit seed, e.g. a base seed and a match index.
 * @param values - Numeric inputs to mix.
 * @returns Unsigned 32-bit hash.
 */
export function hashSeed(...values: number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (const value of values) {
    hash ^= toUint32(value);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Create a deterministic xorshift32 source from a seed.
 * @param seed - Seed value; zero is remapped so the stream never sticks.
 * @returns Random source returning [0, 1).
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Uniform integer in [0, n).
 * @param rng - Random source.
 * @param n - Exclusive upper bound.
 */
export function randomInt(rng: RandomSource, n: number): number {
  return Math.floor(rng() * n);
}
