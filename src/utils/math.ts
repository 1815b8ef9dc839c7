/**
 * Small numeric helpers shared by the environment, featurizer and learner.
 */

import { RandomSource } from "./random";

export function clamp(x: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, x));
}

/**
 * Index of the maximum value. Ties are broken uniformly at random so an
 * all-zero row does not bias the agent toward the first action.
 */
export function argmaxIndex(
  values: readonly number[],
  random: RandomSource,
): number {
  if (values.length === 0) throw new Error("argmaxIndex of empty array");
  let best = -Infinity;
  const tied: number[] = [];
  values.forEach((v, i) => {
    if (v > best) {
      best = v;
      tied.length = 0;
      tied.push(i);
    } else if (v === best) {
      tied.push(i);
    }
  });
  // All -Infinity/NaN rows fall back to a uniform pick.
  if (tied.length === 0) return random.int(values.length);
  return tied[random.int(tied.length)] ?? 0;
}

export function maxValue(values: readonly number[]): number {
  return values.reduce((m, v) => (v > m ? v : m), -Infinity);
}

/** Exponential normalization, shifted by the max for stability. */
export function softmax(xs: readonly number[]): number[] {
  const m = maxValue(xs);
  const exps = xs.map((x) => Math.exp(x - m));
  const s = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / s);
}

/** Divide by the sum; a zero sum yields the uniform vector. */
export function normalize(xs: readonly number[]): number[] {
  const s = xs.reduce((a, b) => a + b, 0);
  if (s === 0) return xs.map(() => 1 / xs.length);
  return xs.map((x) => x / s);
}

/**
 * Bucket index of `x` against ascending thresholds: the first threshold it is
 * below, or `thresholds.length` when at or above all of them.
 */
export function bucketize(x: number, thresholds: readonly number[]): number {
  for (let i = 0; i < thresholds.length; i++) {
    const t = thresholds[i];
    if (t !== undefined && x < t) return i;
  }
  return thresholds.length;
}

export function mean(xs: readonly number[]): number {
  if (xs.length === 0) return 0;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}
