/**
 * Code Parser Module
 *
 * Tree-sitter based parsing of Python sources into the kernel syntax model.
 *
 * @module
 */

export * from "./parser-manager.js";
export * from "./python-reader.js";
export * from "./expression-text.js";
