/**
 * Random translocation: rotate every sequence circularly by a signed shift.
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import { exampleAt, stackExamples } from "./batch.js";
import {
  type TranslocationConfig,
  defaultTranslocationConfig,
  resolveConfig,
  validateBounds,
} from "./config.js";
import { sampleInts, sampleSigns } from "./sampler.js";

export interface TranslocationParams {
  /** Signed shift per example; positive moves symbols toward higher indices. */
  readonly shifts: Int32Array;
}

export class RandomTranslocation extends AugmentBase<TranslocationConfig, TranslocationParams> {
  readonly name = "translocation";

  constructor(config: Partial<TranslocationConfig> = {}) {
    super(resolveConfig("translocation", defaultTranslocationConfig, config, (c) =>
      validateBounds("shift", c.shiftMin, c.shiftMax)));
  }

  sample(_x: SequenceBatch, { n }: BatchDims, { rng }: AugmentContext): TranslocationParams {
    const { shiftMin, shiftMax } = this.config;
    const shifts = sampleInts(rng, n, shiftMin, shiftMax);
    const signs = sampleSigns(rng, n);
    for (let i = 0; i < n; i++) shifts[i] *= signs[i];
    return { shifts };
  }

  edit(x: SequenceBatch, { shifts }: TranslocationParams, backend: Backend): SequenceBatch {
    const n = x.shape[0];
    const out: TensorData[] = [];
    for (let i = 0; i < n; i++) {
      out.push(backend.roll(exampleAt(backend, x, i), shifts[i], 2));
    }
    return stackExamples(backend, out, x);
  }
}
