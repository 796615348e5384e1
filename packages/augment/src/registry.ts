/**
 * Named augmentation factories, so a pipeline can be described as data:
 *
 * ```ts
 * const pipeline = buildPipeline([
 *   { name: "deletion", params: { deleteMax: 20 } },
 *   { name: "rc" },
 * ]);
 * ```
 */
import { type Augmentation, Registry } from "@seqaug/core";
import type {
  DeletionConfig,
  InsertionConfig,
  InversionConfig,
  MutationConfig,
  NoiseConfig,
  PipelineOptions,
  ReverseComplementConfig,
  TranslocationConfig,
} from "./config.js";
import { RandomDeletion } from "./deletion.js";
import { RandomInsertion } from "./insertion.js";
import { RandomInversion } from "./inversion.js";
import { RandomMutation } from "./mutation.js";
import { RandomNoise } from "./noise.js";
import { AugmentPipeline } from "./pipeline.js";
import { RandomRC } from "./reverse-complement.js";
import { RandomTranslocation } from "./translocation.js";

/** Any primitive's bounds; each factory rejects keys its primitive does not take. */
export type AugmentParams = Partial<
  DeletionConfig & InsertionConfig & TranslocationConfig & InversionConfig &
  MutationConfig & ReverseComplementConfig & NoiseConfig
>;

export interface AugmentEntry {
  readonly name: string;
  readonly params?: AugmentParams;
}

export const augmentRegistry = new Registry<Augmentation, AugmentParams>("augment");

augmentRegistry.register("deletion", (p) => new RandomDeletion(p));
augmentRegistry.register("insertion", (p) => new RandomInsertion(p));
augmentRegistry.register("translocation", (p) => new RandomTranslocation(p));
augmentRegistry.register("inversion", (p) => new RandomInversion(p));
augmentRegistry.register("mutation", (p) => new RandomMutation(p));
augmentRegistry.register("rc", (p) => new RandomRC(p));
augmentRegistry.register("noise", (p) => new RandomNoise(p));

/** Build primitives in the order given. */
export function buildAugmentations(entries: readonly AugmentEntry[]): Augmentation[] {
  return entries.map((e) => augmentRegistry.get(e.name, e.params ?? {}));
}

export function buildPipeline(
  entries: readonly AugmentEntry[],
  options: PipelineOptions = {},
): AugmentPipeline {
  return new AugmentPipeline(buildAugmentations(entries), options);
}
