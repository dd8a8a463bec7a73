// ---------------------------------------------------------------------------
// Seeded randomness and sampling
// ---------------------------------------------------------------------------

/** Seedable PRNG returning uniform values in [0, 1). */
export type PRNG = () => number;

/**
 * Mulberry32 generator. Same seed, same stream, which keeps bootstrap
 * resamples and feature subsets reproducible across runs.
 */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Draw a 32-bit integer seed from an existing stream. */
export function deriveSeed(rng: PRNG): number {
  return Math.floor(rng() * 4294967296) | 0;
}

/** Integer in `[min, max)`. */
export function randomInt(rng: PRNG, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min));
}

/** Sample `count` integers from `[min, max)` with replacement. */
export function rangeWithReplacement(
  rng: PRNG,
  min: number,
  max: number,
  count: number,
): number[] {
  if (max <= min) {
    throw new RangeError('max must be greater than min');
  }
  const result = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    result[i] = randomInt(rng, min, max);
  }
  return result;
}

/**
 * Sample `count` distinct items from `input` (partial Fisher-Yates).
 * A count larger than the input returns every item in shuffled order.
 */
export function sampleWithoutReplacement<T>(
  input: readonly T[],
  count: number,
  rng: PRNG,
): T[] {
  const all = [...input];
  const n = all.length;
  const k = Math.max(0, Math.min(count, n));
  for (let i = 0; i < k; i++) {
    const j = i + Math.floor(rng() * (n - i));
    const tmp = all[i]!;
    all[i] = all[j]!;
    all[j] = tmp;
  }
  return all.slice(0, k);
}

/** Shuffled copy of `input`. */
export function shuffle<T>(input: readonly T[], rng: PRNG): T[] {
  return sampleWithoutReplacement(input, input.length, rng);
}
