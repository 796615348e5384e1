/**
 * Augmentation pipeline: an ordered fold of primitives over a batch.
 *
 * Per batch the pipeline may draw a subset of its augmentations
 * (`maxAugsPerBatch`, `hardAug`); the drawn ones always run in configured
 * order. Nothing is kept between calls.
 */
import { Effect } from "effect";
import {
  type Augmentation,
  type AugmentContext,
  type AugmentError,
  type BatchDims,
  type Rng,
  type SequenceBatch,
  type SequenceShape,
  BackendService,
  RngService,
  ShapeError,
  isAugmentError,
} from "@seqaug/core";
import { withSpan } from "@seqaug/effect-runtime";
import { batchDims } from "./batch.js";
import { type PipelineOptions, validatePipelineOptions } from "./config.js";
import { randint, sampleWithoutReplacement } from "./sampler.js";

/** Run a synchronous step, keeping tagged augmentation errors on the error channel. */
function attempt<A>(f: () => A): Effect.Effect<A, AugmentError> {
  return Effect.suspend((): Effect.Effect<A, AugmentError> => {
    try {
      return Effect.succeed(f());
    } catch (cause) {
      return isAugmentError(cause) ? Effect.fail(cause) : Effect.die(cause);
    }
  });
}

export class AugmentPipeline {
  readonly augmentations: readonly Augmentation[];
  readonly maxAugsPerBatch: number;
  readonly hardAug: boolean;
  readonly expectedShape: SequenceShape | undefined;

  constructor(augmentations: readonly Augmentation[], options: PipelineOptions = {}) {
    validatePipelineOptions(options, augmentations.length);
    this.augmentations = [...augmentations];
    this.maxAugsPerBatch = options.maxAugsPerBatch ?? augmentations.length;
    this.hardAug = options.hardAug ?? true;
    this.expectedShape = options.expectedShape;
  }

  /** Augmentations to run on the next batch, in configured order. */
  select(rng: Rng): Augmentation[] {
    const total = this.augmentations.length;
    if (total === 0) return [];
    const count = this.hardAug ? this.maxAugsPerBatch : randint(rng, 1, this.maxAugsPerBatch);
    if (count === total) return [...this.augmentations];
    const picked = Array.from(sampleWithoutReplacement(rng, total, count)).sort((p, q) => p - q);
    return picked.map((i) => this.augmentations[i]);
  }

  checkShape(x: SequenceBatch): BatchDims {
    const dims = batchDims(x);
    const expected = this.expectedShape;
    if (expected && (dims.a !== expected.alphabetSize || dims.l !== expected.length)) {
      throw new ShapeError({
        message:
          `Batch [${x.shape}] does not match pipeline shape ` +
          `[N, ${expected.alphabetSize}, ${expected.length}]`,
      });
    }
    return dims;
  }

  /** Apply the drawn augmentations in order. Throws ShapeError / ConfigurationError. */
  apply(x: SequenceBatch, ctx: AugmentContext): SequenceBatch {
    this.checkShape(x);
    let out = x;
    for (const aug of this.select(ctx.rng)) {
      out = aug.apply(out, ctx);
    }
    return out;
  }

  /** `apply` as an Effect over the RNG and backend services, one span per stage. */
  run(x: SequenceBatch): Effect.Effect<SequenceBatch, AugmentError, RngService | BackendService> {
    const pipeline = this;
    return Effect.gen(function* () {
      const rng = yield* RngService;
      const backend = yield* BackendService;
      const ctx: AugmentContext = { rng, backend };

      yield* attempt(() => pipeline.checkShape(x));
      const stages = pipeline.select(rng);
      yield* Effect.logDebug(`augment: ${stages.map((s) => s.name).join(" -> ") || "(none)"}`);

      let out = x;
      for (const aug of stages) {
        const input = out;
        out = yield* withSpan(`augment.${aug.name}`, attempt(() => aug.apply(input, ctx)));
        yield* Effect.logDebug(`${aug.name} -> [${out.shape.join(", ")}]`);
      }
      return out;
    });
  }
}
