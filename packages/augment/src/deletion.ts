/**
 * Random deletion: cut a contiguous stretch out of every sequence and
 * restore the length with random filler split across both ends.
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import { exampleAt, requireFits, span, stackExamples } from "./batch.js";
import {
  type DeletionConfig,
  defaultDeletionConfig,
  resolveConfig,
  validateBounds,
} from "./config.js";
import { randomSequences } from "./random-sequence.js";
import { sampleInts } from "./sampler.js";

export interface DeletionParams {
  /** Deleted length per example, in [deleteMin, deleteMax]. */
  readonly lengths: Int32Array;
  /** Deletion start per example, in [0, L - deleteMax]. */
  readonly starts: Int32Array;
  /** Random filler, [N, A, deleteMax]. */
  readonly padding: TensorData;
}

export class RandomDeletion extends AugmentBase<DeletionConfig, DeletionParams> {
  readonly name = "deletion";

  constructor(config: Partial<DeletionConfig> = {}) {
    super(resolveConfig("deletion", defaultDeletionConfig, config, (c) =>
      validateBounds("delete", c.deleteMin, c.deleteMax)));
  }

  protected check(dims: BatchDims): void {
    requireFits("deleteMax", this.config.deleteMax, dims.l);
  }

  sample(x: SequenceBatch, { n, a, l }: BatchDims, { rng, backend }: AugmentContext): DeletionParams {
    const { deleteMin, deleteMax } = this.config;
    const padding = randomSequences(backend, rng, n, a, deleteMax, x.dtype);
    const lengths = sampleInts(rng, n, deleteMin, deleteMax);
    // Starts are bounded by deleteMax, not the drawn length, so every window stays in range.
    const starts = sampleInts(rng, n, 0, l - deleteMax);
    return { lengths, starts, padding };
  }

  edit(x: SequenceBatch, { lengths, starts, padding }: DeletionParams, backend: Backend): SequenceBatch {
    const [n, , l] = x.shape;
    const padMax = padding.shape[2];
    const out: TensorData[] = [];
    for (let i = 0; i < n; i++) {
      const seq = exampleAt(backend, x, i);
      const pad = exampleAt(backend, padding, i);
      const len = lengths[i];
      const start = starts[i];
      // Odd lengths put the extra filler position at the back.
      const front = Math.floor(len / 2);
      const back = len - front;
      out.push(backend.cat([
        span(backend, pad, 0, front),
        span(backend, seq, 0, start),
        span(backend, seq, start + len, l),
        span(backend, pad, padMax - back, padMax),
      ], 2));
    }
    return stackExamples(backend, out, x);
  }
}
