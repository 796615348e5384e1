/**
 * @seqaug/augment -- evolution-inspired augmentations for one-hot sequence
 * batches of shape [N, A, L], and the pipeline that composes them.
 */
export { AugmentBase } from "./base.js";
export { batchDims, requireFits, exampleAt, span, stackExamples } from "./batch.js";
export * from "./config.js";
export { randomSequence, randomSequences } from "./random-sequence.js";
export {
  randint,
  sampleInts,
  sampleMask,
  sampleSigns,
  sampleWithoutReplacement,
} from "./sampler.js";

export { RandomDeletion, type DeletionParams } from "./deletion.js";
export { RandomInsertion, type InsertionParams } from "./insertion.js";
export { RandomTranslocation, type TranslocationParams } from "./translocation.js";
export { RandomInversion, type InversionParams } from "./inversion.js";
export { RandomMutation, type MutationParams } from "./mutation.js";
export { RandomRC, type ReverseComplementParams } from "./reverse-complement.js";
export { RandomNoise, type NoiseParams } from "./noise.js";

export { AugmentPipeline } from "./pipeline.js";
export {
  augmentRegistry,
  buildAugmentations,
  buildPipeline,
  type AugmentEntry,
  type AugmentParams,
} from "./registry.js";
