/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";
import type { Dtype, NumericArray, Shape } from "./types.js";

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly dtype: Dtype;
  readonly data: NumericArray;
}

/** A rank-3 tensor laid out as [N, A, L]. */
export type SequenceBatch = TensorData;

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform integer in [0, n). */
  nextInt(n: number): number;
  /** Standard normal sample. */
  nextGauss(): number;
  state(): number;
  setState(s: number): void;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}

// ── Backend ────────────────────────────────────────────────────────────────
export interface Backend {
  readonly name: string;

  // creation
  zeros(shape: Shape, dtype?: Dtype): TensorData;
  full(shape: Shape, value: number, dtype?: Dtype): TensorData;
  fromArray(data: ArrayLike<number>, shape: Shape, dtype?: Dtype): TensorData;
  /** Gaussian samples with the given mean and standard deviation. */
  normal(shape: Shape, mean: number, std: number, rng: Rng, dtype?: Dtype): TensorData;
  /** One-hot rows: output shape is `[...indices.shape, depth]`. */
  oneHot(indices: TensorData, depth: number, dtype?: Dtype): TensorData;

  // math
  add(a: TensorData, b: TensorData): TensorData;
  sub(a: TensorData, b: TensorData): TensorData;

  // reshape / slice
  reshape(a: TensorData, shape: Shape): TensorData;
  transpose(a: TensorData, dim0: number, dim1: number): TensorData;
  slice(a: TensorData, starts: readonly number[], ends: readonly number[]): TensorData;
  cat(tensors: readonly TensorData[], axis: number): TensorData;
  /** Reverse the order of elements along every axis in `dims`. */
  flip(a: TensorData, dims: readonly number[]): TensorData;
  /** Circular shift: `out[(i + shift) mod n] = a[i]` along `axis`. */
  roll(a: TensorData, shift: number, axis: number): TensorData;

  // utility
  clone(a: TensorData): TensorData;

  // comparison
  equal(a: TensorData, b: TensorData): boolean;
  allClose(a: TensorData, b: TensorData, atol?: number, rtol?: number): boolean;
}

export class BackendService extends Context.Tag("BackendService")<
  BackendService,
  Backend
>() {}

// ── Augmentation ───────────────────────────────────────────────────────────

/** Capabilities every augmentation call receives. */
export interface AugmentContext {
  readonly rng: Rng;
  readonly backend: Backend;
}

/**
 * A randomized batch transform. `apply` returns a new batch of the same
 * shape and never mutates its input.
 */
export interface Augmentation {
  readonly name: string;
  apply(x: SequenceBatch, ctx: AugmentContext): SequenceBatch;
}
