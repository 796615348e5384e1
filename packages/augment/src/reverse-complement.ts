/**
 * Random reverse-complement: with probability rcProb, flip a whole example
 * along both the alphabet and the length axes.
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import { exampleAt, stackExamples } from "./batch.js";
import {
  type ReverseComplementConfig,
  defaultReverseComplementConfig,
  resolveConfig,
  validateUnitInterval,
} from "./config.js";
import { sampleMask } from "./sampler.js";

export interface ReverseComplementParams {
  /** Which examples are flipped. */
  readonly mask: readonly boolean[];
}

export class RandomRC extends AugmentBase<ReverseComplementConfig, ReverseComplementParams> {
  readonly name = "rc";

  constructor(config: Partial<ReverseComplementConfig> = {}) {
    super(resolveConfig("rc", defaultReverseComplementConfig, config, (c) =>
      validateUnitInterval("rcProb", c.rcProb)));
  }

  sample(_x: SequenceBatch, { n }: BatchDims, { rng }: AugmentContext): ReverseComplementParams {
    return { mask: sampleMask(rng, n, this.config.rcProb) };
  }

  edit(x: SequenceBatch, { mask }: ReverseComplementParams, backend: Backend): SequenceBatch {
    const n = x.shape[0];
    const out: TensorData[] = [];
    for (let i = 0; i < n; i++) {
      const seq = exampleAt(backend, x, i);
      out.push(mask[i] ? backend.flip(seq, [1, 2]) : seq);
    }
    return stackExamples(backend, out, x);
  }
}
