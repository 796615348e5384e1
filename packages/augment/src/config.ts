/**
 * Augmentation configs and defaults.
 *
 * Every primitive takes a partial config that is merged over its defaults and
 * validated once at construction; the result is frozen for the primitive's
 * lifetime.
 */
import { ConfigurationError, type SequenceShape } from "@seqaug/core";

export interface DeletionConfig {
  readonly deleteMin: number;
  readonly deleteMax: number;
}

export interface InsertionConfig {
  readonly insertMin: number;
  readonly insertMax: number;
}

export interface TranslocationConfig {
  readonly shiftMin: number;
  readonly shiftMax: number;
}

export interface InversionConfig {
  readonly invertMin: number;
  readonly invertMax: number;
}

export interface MutationConfig {
  /** Target fraction of positions whose symbol actually changes. */
  readonly mutateFrac: number;
}

export interface ReverseComplementConfig {
  readonly rcProb: number;
}

export interface NoiseConfig {
  readonly noiseMean: number;
  readonly noiseStd: number;
}

export const defaultDeletionConfig: DeletionConfig = { deleteMin: 0, deleteMax: 30 };
export const defaultInsertionConfig: InsertionConfig = { insertMin: 0, insertMax: 30 };
export const defaultTranslocationConfig: TranslocationConfig = { shiftMin: 0, shiftMax: 30 };
export const defaultInversionConfig: InversionConfig = { invertMin: 0, invertMax: 30 };
export const defaultMutationConfig: MutationConfig = { mutateFrac: 0.1 };
export const defaultReverseComplementConfig: ReverseComplementConfig = { rcProb: 0.5 };
export const defaultNoiseConfig: NoiseConfig = { noiseMean: 0.0, noiseStd: 0.2 };

// ── Pipeline options ───────────────────────────────────────────────────────

export interface PipelineOptions {
  /** Augmentations drawn per batch; defaults to all of them. */
  readonly maxAugsPerBatch?: number;
  /** Always draw exactly `maxAugsPerBatch` (true) or a count in [1, maxAugsPerBatch] (false). */
  readonly hardAug?: boolean;
  /** Reject batches whose alphabet size or length differ from this. */
  readonly expectedShape?: SequenceShape;
}

// ── Validation ─────────────────────────────────────────────────────────────

function fail(message: string): never {
  throw new ConfigurationError({ message });
}

/** Integer bounds with 0 <= min <= max. */
export function validateBounds(name: string, min: number, max: number): void {
  if (!Number.isInteger(min) || min < 0) fail(`${name}Min must be an integer >= 0, got ${min}`);
  if (!Number.isInteger(max) || max < 0) fail(`${name}Max must be an integer >= 0, got ${max}`);
  if (min > max) fail(`${name}Min (${min}) must be <= ${name}Max (${max})`);
}

export function validateUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    fail(`${name} must be in [0,1], got ${value}`);
  }
}

export function validateNoiseConfig(config: NoiseConfig): void {
  if (!Number.isFinite(config.noiseMean)) fail(`noiseMean must be finite, got ${config.noiseMean}`);
  if (!Number.isFinite(config.noiseStd) || config.noiseStd < 0) {
    fail(`noiseStd must be finite and >= 0, got ${config.noiseStd}`);
  }
}

export function validatePipelineOptions(options: PipelineOptions, count: number): void {
  const { maxAugsPerBatch, expectedShape } = options;
  if (maxAugsPerBatch !== undefined) {
    if (!Number.isInteger(maxAugsPerBatch) || maxAugsPerBatch < 1 || maxAugsPerBatch > count) {
      fail(`maxAugsPerBatch must be an integer in [1, ${count}], got ${maxAugsPerBatch}`);
    }
  }
  if (expectedShape) {
    const { alphabetSize, length } = expectedShape;
    if (!Number.isInteger(alphabetSize) || alphabetSize < 1) {
      fail(`expectedShape.alphabetSize must be an integer >= 1, got ${alphabetSize}`);
    }
    if (!Number.isInteger(length) || length < 0) {
      fail(`expectedShape.length must be an integer >= 0, got ${length}`);
    }
  }
}

/**
 * Merge a partial config over defaults and validate it. Keys that the
 * defaults do not know are rejected so a misspelt bound is not ignored.
 */
export function resolveConfig<C extends object>(
  subsystem: string,
  defaults: C,
  partial: Partial<C>,
  validate: (config: C) => void,
): Readonly<C> {
  for (const key of Object.keys(partial)) {
    if (!Object.hasOwn(defaults, key)) {
      fail(`[${subsystem}] Unknown option "${key}". Known: ${Object.keys(defaults).join(", ")}`);
    }
  }
  const config: C = { ...defaults, ...partial };
  validate(config);
  return Object.freeze(config);
}
