/**
 * Kernel Schema Module
 *
 * @module
 */

export * from "./kernel-schema.js";
export * from "./schema-loader.js";
