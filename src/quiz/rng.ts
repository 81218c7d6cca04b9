export type RNG = () => number;

/** mulberry32: small deterministic PRNG, returns floats in [0, 1) */
const mulberry32 = (seed: number): RNG => {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/** xfnv1a over the seed's decimal form, so every integer gets its own state */
export const hashSeed = (seed: number): number => {
  const text = String(seed);
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
};

/**
 * Create the random source for one generation run.
 * Without a seed this falls back to Math.random and runs are not reproducible.
 */
export const makeRng = (seed?: number): RNG => {
  if (seed === undefined) return () => Math.random();
  return mulberry32(hashSeed(seed));
};

/** Uniform integer in [0, bound) */
export const randomIndex = (rng: RNG, bound: number): number =>
  Math.min(bound - 1, Math.floor(rng() * bound));

/** Fisher-Yates shuffle on a copy */
export const shuffleWith = <T>(items: readonly T[], rng: RNG): T[] => {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = randomIndex(rng, i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
};
