/**
 * Re-exports all domain type definitions.
 */

export * from "./device.js";
export * from "./recording.js";
export * from "./ws.js";
