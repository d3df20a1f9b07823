/**
 * @tokbridge/core -- shared types, capability interfaces, errors and config.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./config.js";
export { Registry } from "./registry.js";
export { SeededRng } from "./rng.js";
export { fnv1a, fingerprint } from "./hash.js";
