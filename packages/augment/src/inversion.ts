/**
 * Random inversion: reverse a contiguous stretch of every sequence along
 * both the length and the alphabet axes.
 *
 * The alphabet flip is a literal axis reversal; it matches base pairing only
 * when the alphabet is ordered so that reversal is the complement (ACGT).
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import { exampleAt, requireFits, span, stackExamples } from "./batch.js";
import {
  type InversionConfig,
  defaultInversionConfig,
  resolveConfig,
  validateBounds,
} from "./config.js";
import { sampleInts } from "./sampler.js";

export interface InversionParams {
  /** Inverted length per example, in [invertMin, invertMax]. */
  readonly lengths: Int32Array;
  /** Inversion start per example, in [0, L - invertMax]. */
  readonly starts: Int32Array;
}

export class RandomInversion extends AugmentBase<InversionConfig, InversionParams> {
  readonly name = "inversion";

  constructor(config: Partial<InversionConfig> = {}) {
    super(resolveConfig("inversion", defaultInversionConfig, config, (c) =>
      validateBounds("invert", c.invertMin, c.invertMax)));
  }

  protected check(dims: BatchDims): void {
    requireFits("invertMax", this.config.invertMax, dims.l);
  }

  sample(_x: SequenceBatch, { n, l }: BatchDims, { rng }: AugmentContext): InversionParams {
    const { invertMin, invertMax } = this.config;
    const lengths = sampleInts(rng, n, invertMin, invertMax);
    const starts = sampleInts(rng, n, 0, l - invertMax);
    return { lengths, starts };
  }

  edit(x: SequenceBatch, { lengths, starts }: InversionParams, backend: Backend): SequenceBatch {
    const [n, , l] = x.shape;
    const out: TensorData[] = [];
    for (let i = 0; i < n; i++) {
      const seq = exampleAt(backend, x, i);
      const start = starts[i];
      const end = start + lengths[i];
      out.push(backend.cat([
        span(backend, seq, 0, start),
        backend.flip(span(backend, seq, start, end), [1, 2]),
        span(backend, seq, end, l),
      ], 2));
    }
    return stackExamples(backend, out, x);
  }
}
