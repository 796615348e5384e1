/**
 * Random insertion: splice a random stretch into every sequence.
 *
 * One fragment of length insertMax per example supplies both the inserted
 * symbols and the filler around the sequence. The extended row is
 * L + insertMax long and the output is its centred length-L window.
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import { exampleAt, requireFits, span, stackExamples } from "./batch.js";
import {
  type InsertionConfig,
  defaultInsertionConfig,
  resolveConfig,
  validateBounds,
} from "./config.js";
import { randomSequences } from "./random-sequence.js";
import { sampleInts } from "./sampler.js";

export interface InsertionParams {
  /** Inserted length per example, in [insertMin, insertMax]. */
  readonly lengths: Int32Array;
  /** Insertion index per example, in [0, L]. */
  readonly positions: Int32Array;
  /** Random fragments, [N, A, insertMax]. */
  readonly fragments: TensorData;
}

export class RandomInsertion extends AugmentBase<InsertionConfig, InsertionParams> {
  readonly name = "insertion";

  constructor(config: Partial<InsertionConfig> = {}) {
    super(resolveConfig("insertion", defaultInsertionConfig, config, (c) =>
      validateBounds("insert", c.insertMin, c.insertMax)));
  }

  protected check(dims: BatchDims): void {
    requireFits("insertMax", this.config.insertMax, dims.l);
  }

  sample(x: SequenceBatch, { n, a, l }: BatchDims, { rng, backend }: AugmentContext): InsertionParams {
    const { insertMin, insertMax } = this.config;
    const fragments = randomSequences(backend, rng, n, a, insertMax, x.dtype);
    const lengths = sampleInts(rng, n, insertMin, insertMax);
    const positions = sampleInts(rng, n, 0, l);
    return { lengths, positions, fragments };
  }

  edit(x: SequenceBatch, { lengths, positions, fragments }: InsertionParams, backend: Backend): SequenceBatch {
    const [n, , l] = x.shape;
    const fragMax = fragments.shape[2];
    const offset = Math.floor(fragMax / 2);
    const out: TensorData[] = [];
    for (let i = 0; i < n; i++) {
      const seq = exampleAt(backend, x, i);
      const frag = exampleAt(backend, fragments, i);
      const len = lengths[i];
      const at = positions[i];
      // fragment = [front pad | inserted | back pad]
      const front = Math.floor((fragMax - len) / 2);
      const extended = backend.cat([
        span(backend, frag, 0, front),
        span(backend, seq, 0, at),
        span(backend, frag, front, front + len),
        span(backend, seq, at, l),
        span(backend, frag, front + len, fragMax),
      ], 2);
      out.push(span(backend, extended, offset, offset + l));
    }
    return stackExamples(backend, out, x);
  }
}
