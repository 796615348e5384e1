/**
 * Effect layers for dependency injection.
 *
 * The augmentation pipeline's `run` needs an RNG and a tensor backend; each
 * gets a Layer here.
 */
import { Layer } from "effect";
import {
  BackendService, RngService,
  type Backend, type Rng,
  SeededRng,
} from "@seqaug/core";
import { CpuRefBackend } from "@seqaug/tensor";

// ── RNG Layer ──────────────────────────────────────────────────────────────

/** Provide a caller-owned generator, e.g. one shared with a data loader. */
export const RngFrom = (rng: Rng) =>
  Layer.succeed(RngService, rng);

export const RngLive = (seed: number) =>
  RngFrom(new SeededRng(seed));

// ── Backend Layer ──────────────────────────────────────────────────────────

export const BackendFrom = (backend: Backend) =>
  Layer.succeed(BackendService, backend);

export const BackendLive = BackendFrom(new CpuRefBackend());

// ── Combined ───────────────────────────────────────────────────────────────

/** Everything `AugmentPipeline.run` requires, seeded and on the CPU backend unless overridden. */
export const AugmentRuntime = (seed: number, backend?: Backend) =>
  Layer.mergeAll(RngLive(seed), backend ? BackendFrom(backend) : BackendLive);
