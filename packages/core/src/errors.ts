/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Invalid augmentation bounds, options or registry names. */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A batch whose rank, size or dimensions do not fit the operation. */
export class ShapeError extends Data.TaggedError("ShapeError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class BackendError extends Data.TaggedError("BackendError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type AugmentError = ConfigurationError | ShapeError;

export function isAugmentError(cause: unknown): cause is AugmentError {
  return cause instanceof ConfigurationError || cause instanceof ShapeError;
}
