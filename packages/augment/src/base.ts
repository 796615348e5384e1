/**
 * Base class for the augmentation primitives.
 *
 * A call splits into `sample` (draw every random per-example parameter) and
 * `edit` (apply those parameters deterministically). Tests drive `edit`
 * directly with hand-picked parameters.
 */
import type {
  Augmentation,
  AugmentContext,
  Backend,
  BatchDims,
  SequenceBatch,
} from "@seqaug/core";
import { batchDims } from "./batch.js";

export abstract class AugmentBase<C, P> implements Augmentation {
  abstract readonly name: string;
  readonly config: Readonly<C>;

  protected constructor(config: Readonly<C>) {
    this.config = config;
  }

  apply(x: SequenceBatch, ctx: AugmentContext): SequenceBatch {
    const dims = batchDims(x);
    this.check(dims);
    const params = this.sample(x, dims, ctx);
    return this.edit(x, params, ctx.backend);
  }

  /** Call-time checks against the batch dimensions. */
  protected check(_dims: BatchDims): void {}

  abstract sample(x: SequenceBatch, dims: BatchDims, ctx: AugmentContext): P;

  abstract edit(x: SequenceBatch, params: P, backend: Backend): SequenceBatch;
}
