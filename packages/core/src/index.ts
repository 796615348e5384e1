/**
 * @seqaug/core -- shared types, ports, errors and the seeded RNG.
 */
export * from "./types.js";
export * from "./interfaces.js";
export * from "./errors.js";
export * from "./broadcast.js";
export { SeededRng } from "./rng.js";
export { Registry } from "./registry.js";
