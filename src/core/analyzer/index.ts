/**
 * Kernel Analyzer Module
 *
 * Rule engine for `@kernel` parameter conventions.
 *
 * @module
 */

export * from "./issues.js";
export * from "./classification.js";
export * from "./kernel-detection.js";
export * from "./kernel-analyzer.js";
export * from "./rules/index.js";
