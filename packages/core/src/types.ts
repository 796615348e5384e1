/**
 * Core types for the seqaug system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "f32" | "f64" | "i32";

export type NumericArray = Float32Array | Float64Array | Int32Array;

export function allocArray(d: Dtype, size: number): NumericArray {
  switch (d) {
    case "f32": return new Float32Array(size);
    case "f64": return new Float64Array(size);
    case "i32": return new Int32Array(size);
  }
}

export function arrayFrom(d: Dtype, values: ArrayLike<number>): NumericArray {
  const out = allocArray(d, values.length);
  for (let i = 0; i < values.length; i++) out[i] = values[i];
  return out;
}

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

export function shapeStrides(shape: Shape): number[] {
  const strides: number[] = new Array(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function sameShape(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let d = 0; d < a.length; d++) {
    if (a[d] !== b[d]) return false;
  }
  return true;
}

// ── Sequence batches ───────────────────────────────────────────────────────

/** Dimensions of a one-hot sequence batch laid out as [N, A, L]. */
export interface BatchDims {
  /** Batch size. */
  readonly n: number;
  /** Alphabet size (4 for DNA). */
  readonly a: number;
  /** Sequence length. */
  readonly l: number;
}

/** Alphabet size and length a pipeline is pinned to. */
export interface SequenceShape {
  readonly alphabetSize: number;
  readonly length: number;
}
