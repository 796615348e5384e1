/**
 * cpu_ref -- Reference CPU backend for the seqaug tensor system.
 *
 * Every operation is implemented with straightforward loops over typed arrays.
 * The goal is correctness, not speed.
 */

import {
  type Backend,
  type Rng,
  type TensorData,
  type Dtype,
  type NumericArray,
  type Shape,
  BackendError,
  ShapeError,
  allocArray,
  arrayFrom,
  broadcastIndices,
  broadcastShapes,
  sameShape,
  shapeSize,
  shapeStrides,
} from "@seqaug/core";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTensor(shape: Shape, dtype: Dtype, data: NumericArray): TensorData {
  return { shape, dtype, data };
}

function allocTensor(shape: Shape, dtype: Dtype): TensorData {
  return makeTensor(shape, dtype, allocArray(dtype, shapeSize(shape)));
}

/** Normalise a possibly-negative axis to [0, ndim). */
function normalizeAxis(axis: number, ndim: number): number {
  const a = axis < 0 ? axis + ndim : axis;
  if (a < 0 || a >= ndim) {
    throw new BackendError({ message: `axis ${axis} out of range for ndim ${ndim}` });
  }
  return a;
}

/** Resolve the common dtype for a binary op (promote to wider float if mixed). */
function commonDtype(a: Dtype, b: Dtype): Dtype {
  if (a === b) return a;
  if (a === "f64" || b === "f64") return "f64";
  if (a === "f32" || b === "f32") return "f32";
  return "i32";
}

function binaryOp(
  a: TensorData,
  b: TensorData,
  fn: (x: number, y: number) => number,
): TensorData {
  const dtype = commonDtype(a.dtype, b.dtype);
  // Same-shape fast path; the batch transforms never broadcast.
  if (sameShape(a.shape, b.shape)) {
    const out = allocArray(dtype, a.data.length);
    for (let i = 0; i < out.length; i++) out[i] = fn(a.data[i], b.data[i]);
    return makeTensor(a.shape, dtype, out);
  }
  const [resultShape, stridesA, stridesB] = broadcastShapes(a.shape, b.shape);
  const size = shapeSize(resultShape);
  const out = allocArray(dtype, size);
  for (let i = 0; i < size; i++) {
    const [ia, ib] = broadcastIndices(i, resultShape, stridesA, stridesB);
    out[i] = fn(a.data[ia], b.data[ib]);
  }
  return makeTensor(resultShape, dtype, out);
}

/** Multi-index <-> flat index conversion helpers. */
function flatToMulti(flat: number, shape: Shape): number[] {
  const ndim = shape.length;
  const coords: number[] = new Array(ndim);
  let rem = flat;
  for (let d = ndim - 1; d >= 0; d--) {
    coords[d] = rem % shape[d];
    rem = (rem - coords[d]) / shape[d];
  }
  return coords;
}

function multiToFlat(coords: readonly number[], strides: readonly number[]): number {
  let idx = 0;
  for (let d = 0; d < coords.length; d++) {
    idx += coords[d] * strides[d];
  }
  return idx;
}

function sameRank(a: Shape, b: Shape, op: string): void {
  if (a.length !== b.length) {
    throw new ShapeError({ message: `${op}: expected rank ${a.length}, got rank ${b.length}` });
  }
}

// ---------------------------------------------------------------------------
// CpuRefBackend
// ---------------------------------------------------------------------------

export class CpuRefBackend implements Backend {
  readonly name = "cpu_ref";

  // ── creation ────────────────────────────────────────────────────────────

  zeros(shape: Shape, dtype: Dtype = "f32"): TensorData {
    return allocTensor(shape, dtype);
  }

  full(shape: Shape, value: number, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    t.data.fill(value);
    return t;
  }

  fromArray(data: ArrayLike<number>, shape: Shape, dtype: Dtype = "f32"): TensorData {
    const size = shapeSize(shape);
    if (data.length !== size) {
      throw new ShapeError({
        message: `Data length ${data.length} does not match shape [${shape}] (size ${size})`,
      });
    }
    return makeTensor(shape, dtype, arrayFrom(dtype, data));
  }

  normal(shape: Shape, mean: number, std: number, rng: Rng, dtype: Dtype = "f32"): TensorData {
    const t = allocTensor(shape, dtype);
    for (let i = 0; i < t.data.length; i++) {
      t.data[i] = mean + std * rng.nextGauss();
    }
    return t;
  }

  oneHot(indices: TensorData, depth: number, dtype: Dtype = "f32"): TensorData {
    const count = indices.data.length;
    const out = allocTensor([...indices.shape, depth], dtype);
    for (let i = 0; i < count; i++) {
      const k = indices.data[i];
      if (!Number.isInteger(k) || k < 0 || k >= depth) {
        throw new BackendError({ message: `oneHot: index ${k} out of range for depth ${depth}` });
      }
      out.data[i * depth + k] = 1;
    }
    return out;
  }

  // ── math ────────────────────────────────────────────────────────────────

  add(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x + y);
  }

  sub(a: TensorData, b: TensorData): TensorData {
    return binaryOp(a, b, (x, y) => x - y);
  }

  // ── reshape / slice ─────────────────────────────────────────────────────

  reshape(a: TensorData, shape: Shape): TensorData {
    if (shapeSize(shape) !== shapeSize(a.shape)) {
      throw new ShapeError({ message: `Cannot reshape [${a.shape}] to [${shape}]: size mismatch` });
    }
    // Data is contiguous, just reinterpret with new shape
    return makeTensor(shape, a.dtype, arrayFrom(a.dtype, a.data));
  }

  transpose(a: TensorData, dim0: number, dim1: number): TensorData {
    const ndim = a.shape.length;
    const d0 = normalizeAxis(dim0, ndim);
    const d1 = normalizeAxis(dim1, ndim);

    const newShape = [...a.shape];
    newShape[d0] = a.shape[d1];
    newShape[d1] = a.shape[d0];

    const totalSize = shapeSize(a.shape);
    const out = allocArray(a.dtype, totalSize);
    const dstStrides = shapeStrides(newShape);

    for (let i = 0; i < totalSize; i++) {
      const coords = flatToMulti(i, a.shape);
      const tmp = coords[d0];
      coords[d0] = coords[d1];
      coords[d1] = tmp;
      out[multiToFlat(coords, dstStrides)] = a.data[i];
    }

    return makeTensor(newShape, a.dtype, out);
  }

  slice(a: TensorData, starts: readonly number[], ends: readonly number[]): TensorData {
    const ndim = a.shape.length;
    if (starts.length !== ndim || ends.length !== ndim) {
      throw new ShapeError({ message: `slice: expected ${ndim} bounds for shape [${a.shape}]` });
    }
    const outShape: number[] = new Array(ndim);
    for (let d = 0; d < ndim; d++) {
      if (starts[d] < 0 || ends[d] > a.shape[d] || starts[d] > ends[d]) {
        throw new ShapeError({
          message: `slice: [${starts[d]}, ${ends[d]}) out of bounds for dim ${d} of size ${a.shape[d]}`,
        });
      }
      outShape[d] = ends[d] - starts[d];
    }
    const outSize = shapeSize(outShape);
    const out = allocArray(a.dtype, outSize);
    const srcStrides = shapeStrides(a.shape);

    for (let i = 0; i < outSize; i++) {
      const coords = flatToMulti(i, outShape);
      let srcFlat = 0;
      for (let d = 0; d < ndim; d++) {
        srcFlat += (coords[d] + starts[d]) * srcStrides[d];
      }
      out[i] = a.data[srcFlat];
    }

    return makeTensor(outShape, a.dtype, out);
  }

  cat(tensors: readonly TensorData[], axis: number): TensorData {
    if (tensors.length === 0) throw new ShapeError({ message: "cat: empty tensor list" });
    const first = tensors[0];
    const ndim = first.shape.length;
    const ax = normalizeAxis(axis, ndim);
    const dtype = first.dtype;

    const outShape = [...first.shape];
    for (let t = 1; t < tensors.length; t++) {
      sameRank(first.shape, tensors[t].shape, "cat");
      for (let d = 0; d < ndim; d++) {
        if (d === ax) {
          outShape[d] += tensors[t].shape[d];
        } else if (tensors[t].shape[d] !== outShape[d]) {
          throw new ShapeError({ message: `cat: shape mismatch at dim ${d}` });
        }
      }
    }

    const out = allocArray(dtype, shapeSize(outShape));
    const outStrides = shapeStrides(outShape);

    let axOffset = 0;
    for (const src of tensors) {
      const srcSize = shapeSize(src.shape);
      for (let i = 0; i < srcSize; i++) {
        const coords = flatToMulti(i, src.shape);
        coords[ax] += axOffset;
        out[multiToFlat(coords, outStrides)] = src.data[i];
      }
      axOffset += src.shape[ax];
    }

    return makeTensor(outShape, dtype, out);
  }

  flip(a: TensorData, dims: readonly number[]): TensorData {
    const ndim = a.shape.length;
    const flipped = new Array<boolean>(ndim).fill(false);
    for (const d of dims) flipped[normalizeAxis(d, ndim)] = true;

    const size = shapeSize(a.shape);
    const out = allocArray(a.dtype, size);
    const strides = shapeStrides(a.shape);
    for (let i = 0; i < size; i++) {
      const coords = flatToMulti(i, a.shape);
      for (let d = 0; d < ndim; d++) {
        if (flipped[d]) coords[d] = a.shape[d] - 1 - coords[d];
      }
      out[multiToFlat(coords, strides)] = a.data[i];
    }
    return makeTensor(a.shape, a.dtype, out);
  }

  roll(a: TensorData, shift: number, axis: number): TensorData {
    const ax = normalizeAxis(axis, a.shape.length);
    const n = a.shape[ax];
    const size = shapeSize(a.shape);
    const out = allocArray(a.dtype, size);
    if (n === 0) return makeTensor(a.shape, a.dtype, out);
    const s = ((shift % n) + n) % n;
    const strides = shapeStrides(a.shape);
    for (let i = 0; i < size; i++) {
      const coords = flatToMulti(i, a.shape);
      coords[ax] = (coords[ax] + s) % n;
      out[multiToFlat(coords, strides)] = a.data[i];
    }
    return makeTensor(a.shape, a.dtype, out);
  }

  // ── utility ─────────────────────────────────────────────────────────────

  clone(a: TensorData): TensorData {
    return makeTensor(a.shape, a.dtype, arrayFrom(a.dtype, a.data));
  }

  // ── comparison ──────────────────────────────────────────────────────────

  equal(a: TensorData, b: TensorData): boolean {
    if (!sameShape(a.shape, b.shape)) return false;
    if (a.dtype !== b.dtype) return false;
    for (let i = 0; i < a.data.length; i++) {
      if (a.data[i] !== b.data[i]) return false;
    }
    return true;
  }

  allClose(a: TensorData, b: TensorData, atol = 1e-5, rtol = 1e-8): boolean {
    if (!sameShape(a.shape, b.shape)) return false;
    for (let i = 0; i < a.data.length; i++) {
      const diff = Math.abs(a.data[i] - b.data[i]);
      if (diff > atol + rtol * Math.abs(b.data[i])) return false;
    }
    return true;
  }
}
