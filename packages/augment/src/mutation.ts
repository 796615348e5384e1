/**
 * Random mutation: overwrite a random subset of positions with random
 * symbols.
 *
 * A uniformly drawn replacement over four symbols is silent one time in four,
 * so round(mutateFrac / 0.75 * L) positions (ties to even) are sampled to make the expected
 * fraction of changed positions mutateFrac.
 */
import type { AugmentContext, Backend, BatchDims, SequenceBatch, TensorData } from "@seqaug/core";
import { AugmentBase } from "./base.js";
import {
  type MutationConfig,
  defaultMutationConfig,
  resolveConfig,
  validateUnitInterval,
} from "./config.js";
import { randomSequences } from "./random-sequence.js";
import { sampleWithoutReplacement } from "./sampler.js";

/** Probability that a uniform substitution over four symbols changes the symbol. */
const NON_SILENT_RATE = 0.75;

/** Round to nearest, ties to even. */
function roundHalfEven(x: number): number {
  const lo = Math.floor(x);
  const diff = x - lo;
  if (diff < 0.5) return lo;
  if (diff > 0.5) return lo + 1;
  return lo % 2 === 0 ? lo : lo + 1;
}

export interface MutationParams {
  /** Distinct positions per example, k each. */
  readonly positions: readonly Int32Array[];
  /** Replacement symbols, [N, A, k]. */
  readonly symbols: TensorData;
}

export class RandomMutation extends AugmentBase<MutationConfig, MutationParams> {
  readonly name = "mutation";

  constructor(config: Partial<MutationConfig> = {}) {
    super(resolveConfig("mutation", defaultMutationConfig, config, (c) =>
      validateUnitInterval("mutateFrac", c.mutateFrac)));
  }

  /** Positions sampled per sequence of the given length. */
  mutationCount(length: number): number {
    return Math.min(length, roundHalfEven(this.config.mutateFrac / NON_SILENT_RATE * length));
  }

  sample(x: SequenceBatch, { n, a, l }: BatchDims, { rng, backend }: AugmentContext): MutationParams {
    const k = this.mutationCount(l);
    const positions: Int32Array[] = [];
    for (let i = 0; i < n; i++) positions.push(sampleWithoutReplacement(rng, l, k));
    const symbols = randomSequences(backend, rng, n, a, k, x.dtype);
    return { positions, symbols };
  }

  edit(x: SequenceBatch, { positions, symbols }: MutationParams, backend: Backend): SequenceBatch {
    const [n, a, l] = x.shape;
    const k = symbols.shape[2];
    const out = backend.clone(x);
    for (let i = 0; i < n; i++) {
      const picks = positions[i];
      for (let j = 0; j < picks.length; j++) {
        for (let c = 0; c < a; c++) {
          out.data[(i * a + c) * l + picks[j]] = symbols.data[(i * a + c) * k + j];
        }
      }
    }
    return out;
  }
}
