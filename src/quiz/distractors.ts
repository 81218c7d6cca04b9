import { InsufficientDistractorsError } from "../errors";
import { randomIndex, type RNG } from "./rng";

export type SampleOptions = {
  strict?: boolean;
};

/**
 * Pick up to `count` distinct wrong answers from `pool`.
 *
 * `correct` is removed from the candidates before anything is drawn, so it can
 * never come back as a distractor. When the pool is too small every candidate
 * is returned, unless `strict` is set.
 */
export const sampleDistractors = (
  correct: string,
  pool: Iterable<string>,
  count: number,
  rng: RNG,
  { strict = false }: SampleOptions = {}
): string[] => {
  const candidates = [...new Set(pool)].filter((value) => value !== correct);
  const wanted = Math.max(0, Math.floor(count));

  if (candidates.length < wanted && strict) {
    throw new InsufficientDistractorsError(correct, wanted, candidates.length);
  }

  const take = Math.min(wanted, candidates.length);

  // partial Fisher-Yates: the first `take` slots end up as a uniform sample
  for (let i = 0; i < take; i++) {
    const j = i + randomIndex(rng, candidates.length - i);
    [candidates[i], candidates[j]] = [candidates[j], candidates[i]];
  }

  return candidates.slice(0, take);
};
