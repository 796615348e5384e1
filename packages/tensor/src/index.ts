/**
 * @seqaug/tensor -- Tensor backends for the seqaug system.
 */

export { CpuRefBackend } from "./cpu_ref.js";

export type {
  Backend,
  TensorData,
} from "@seqaug/core";

export type { Dtype, Shape } from "@seqaug/core";

// ── Backend registry ──────────────────────────────────────────────────────

import { Registry } from "@seqaug/core";
import type { Backend } from "@seqaug/core";
import { CpuRefBackend } from "./cpu_ref.js";

export const backendRegistry = new Registry<Backend>("backend");
backendRegistry.register("cpu_ref", () => new CpuRefBackend());
