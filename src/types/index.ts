/**
 * Core types for the lint action
 */

export * from "./lint.js";
export * from "./errors.js";
export * from "./result.js";
