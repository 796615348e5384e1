/**
 * Batch shape checks and per-example slicing over [N, A, L] tensors.
 */
import {
  type Backend,
  type BatchDims,
  type SequenceBatch,
  type TensorData,
  ConfigurationError,
  ShapeError,
  shapeSize,
} from "@seqaug/core";

export function batchDims(x: TensorData): BatchDims {
  if (x.shape.length !== 3) {
    throw new ShapeError({ message: `Expected a batch of shape [N, A, L], got [${x.shape}]` });
  }
  const size = shapeSize(x.shape);
  if (x.data.length !== size) {
    throw new ShapeError({
      message: `Batch data length ${x.data.length} does not match shape [${x.shape}] (size ${size})`,
    });
  }
  const [n, a, l] = x.shape;
  if (a < 1) {
    throw new ShapeError({ message: `Batch alphabet axis must be non-empty, got [${x.shape}]` });
  }
  return { n, a, l };
}

/** Call-time check that an edit window bound fits inside the sequence. */
export function requireFits(name: string, max: number, length: number): void {
  if (max > length) {
    throw new ConfigurationError({
      message: `${name} (${max}) exceeds sequence length ${length}`,
    });
  }
}

/** Example `i` of a batch as a [1, A, L] tensor. */
export function exampleAt(backend: Backend, x: SequenceBatch, i: number): TensorData {
  const [, a, l] = x.shape;
  return backend.slice(x, [i, 0, 0], [i + 1, a, l]);
}

/** Positions [start, end) of a [1, A, L] tensor along the length axis. */
export function span(backend: Backend, t: TensorData, start: number, end: number): TensorData {
  const [n, a] = t.shape;
  return backend.slice(t, [0, 0, start], [n, a, end]);
}

/** Stack [1, A, L] examples back into a batch; an empty batch is cloned. */
export function stackExamples(
  backend: Backend,
  examples: readonly TensorData[],
  x: SequenceBatch,
): SequenceBatch {
  if (examples.length === 0) return backend.clone(x);
  return backend.cat(examples, 0);
}
