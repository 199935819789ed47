/**
 * Barrel re-export for all Zod schemas.
 */
export * from "./edge-messages.js";
export * from "./observer-messages.js";
export * from "./device-api.js";
