/**
 * @edge-fleet/shared: the contract layer of the edge-fleet monorepo.
 *
 * Every other package imports from here. Contains:
 *   - Device, recording and observer protocol types
 *   - Zod schemas for every frame on the device socket
 *   - Identifier helpers
 *   - Structured error hierarchy
 */

export * from "./types/index.js";
export * from "./schemas/index.js";
export * from "./ulid.js";
export * from "./errors.js";
