/**
 * Shared types for the pipeline.
 */

export * from "./json.js";
export * from "./pipeline.js";
