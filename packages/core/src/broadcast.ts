/**
 * Broadcast helpers for elementwise tensor ops.
 *
 * NumPy-style broadcasting: shapes are right-aligned, dimensions of size 1
 * are stretched to match the other operand.
 */
import { ShapeError } from "./errors.js";
import type { Shape } from "./types.js";

/**
 * Broadcast two shapes and return [resultShape, stridesA, stridesB].
 */
export function broadcastShapes(sa: Shape, sb: Shape): [number[], number[], number[]] {
  const ndim = Math.max(sa.length, sb.length);
  const result: number[] = new Array(ndim);
  const padA = ndim - sa.length;
  const padB = ndim - sb.length;

  for (let i = 0; i < ndim; i++) {
    const da = i < padA ? 1 : sa[i - padA];
    const db = i < padB ? 1 : sb[i - padB];
    if (da !== db && da !== 1 && db !== 1) {
      throw new ShapeError({ message: `Cannot broadcast shapes [${sa}] and [${sb}]` });
    }
    result[i] = Math.max(da, db);
  }

  // Stride 0 on a stretched dimension.
  const stridesA: number[] = new Array(ndim);
  const stridesB: number[] = new Array(ndim);
  let strA = 1;
  let strB = 1;
  for (let i = ndim - 1; i >= 0; i--) {
    const da = i < padA ? 1 : sa[i - padA];
    const db = i < padB ? 1 : sb[i - padB];
    stridesA[i] = da === 1 && result[i] !== 1 ? 0 : strA;
    stridesB[i] = db === 1 && result[i] !== 1 ? 0 : strB;
    strA *= da;
    strB *= db;
  }

  return [result, stridesA, stridesB];
}

/** Map a flat index in the result to flat indices in a and b. */
export function broadcastIndices(
  flatIdx: number,
  resultShape: Shape,
  stridesA: readonly number[],
  stridesB: readonly number[],
): [number, number] {
  let idxA = 0;
  let idxB = 0;
  let remainder = flatIdx;
  for (let d = resultShape.length - 1; d >= 0; d--) {
    const coord = remainder % resultShape[d];
    remainder = (remainder - coord) / resultShape[d];
    idxA += coord * stridesA[d];
    idxB += coord * stridesB[d];
  }
  return [idxA, idxB];
}
