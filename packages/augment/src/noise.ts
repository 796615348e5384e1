/**
 * Random noise: add independent Gaussian noise to every element. The output
 * is no longer one-hot, so this usually runs last.
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import {
  type NoiseConfig,
  defaultNoiseConfig,
  resolveConfig,
  validateNoiseConfig,
} from "./config.js";

export interface NoiseParams {
  /** Same shape as the batch. */
  readonly noise: TensorData;
}

export class RandomNoise extends AugmentBase<NoiseConfig, NoiseParams> {
  readonly name = "noise";

  constructor(config: Partial<NoiseConfig> = {}) {
    super(resolveConfig("noise", defaultNoiseConfig, config, validateNoiseConfig));
  }

  sample(x: SequenceBatch, _dims: BatchDims, { rng, backend }: AugmentContext): NoiseParams {
    const { noiseMean, noiseStd } = this.config;
    // Integer batches get float noise; `add` promotes the result.
    const dtype = x.dtype === "f64" ? "f64" : "f32";
    return { noise: backend.normal(x.shape, noiseMean, noiseStd, rng, dtype) };
  }

  edit(x: SequenceBatch, { noise }: NoiseParams, backend: Backend): SequenceBatch {
    return backend.add(x, noise);
  }
}
