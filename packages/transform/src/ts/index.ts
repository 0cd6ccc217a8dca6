/**
 * Transform Package - TypeScript Layer
 *
 * Source code analysis and manipulation utilities.
 */

export * from "./types.js";
export * from "./analyze.js";
export * from "./edit.js";
export * from "./imports.js";
export * from "./type-map.js";
