/**
 * Random sources for qualifying draws and cold-start grid picks.
 *
 * Every stochastic step takes its source as a parameter. Production callers
 * pass Math.random; tests pass a seeded generator for deterministic replay.
 */

/** Produces the next random number in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Seeded pseudo-random number generator (mulberry32).
 */
export function createRng(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle using provided RNG.
 * Returns a new shuffled array (does not mutate input).
 */
export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

/**
 * Uniform sample without replacement of min(count, items.length) items.
 */
export function sample<T>(items: readonly T[], count: number, rng: RandomSource): T[] {
  if (count <= 0) return [];
  return shuffle(items, rng).slice(0, Math.min(count, items.length));
}
