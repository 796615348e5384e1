/**
 * Per-example parameter draws. Every helper returns one independent value
 * per example so a batch never shares an edit.
 */
import type { Rng } from "@seqaug/core";

/** Uniform integer in [lo, hi] (inclusive). */
export function randint(rng: Rng, lo: number, hi: number): number {
  return lo + rng.nextInt(hi - lo + 1);
}

export function sampleInts(rng: Rng, count: number, lo: number, hi: number): Int32Array {
  const out = new Int32Array(count);
  for (let i = 0; i < count; i++) out[i] = randint(rng, lo, hi);
  return out;
}

/** `true` with probability `p`, independently per example. */
export function sampleMask(rng: Rng, count: number, p: number): boolean[] {
  const out = new Array<boolean>(count);
  for (let i = 0; i < count; i++) out[i] = rng.next() < p;
  return out;
}

/** -1 with probability `p`, otherwise +1. */
export function sampleSigns(rng: Rng, count: number, p = 0.5): Int32Array {
  const out = new Int32Array(count);
  for (let i = 0; i < count; i++) out[i] = rng.next() < p ? -1 : 1;
  return out;
}

/**
 * `k` distinct indices from [0, n): draw a random key per index, argsort
 * the keys and keep the first `k`.
 */
export function sampleWithoutReplacement(rng: Rng, n: number, k: number): Int32Array {
  const keys = new Float64Array(n);
  for (let i = 0; i < n; i++) keys[i] = rng.next();
  const order = Array.from({ length: n }, (_, i) => i).sort((p, q) => keys[p] - keys[q]);
  return Int32Array.from(order.slice(0, Math.min(k, n)));
}
