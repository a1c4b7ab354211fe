/**
 * Core module - Shared functionality between the CLI and the language server
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./parser/index.js";
export * from "./schema/index.js";
export * from "./analyzer/index.js";

// Re-export types
export type {
  PyExpr,
  PyName,
  PyAttribute,
  PyCall,
  PyKeyword,
  PyConstant,
  PySubscript,
  PyOtherExpr,
  PyParameter,
  PyWrite,
  PyLiteralKind,
  PyFunctionDef,
  PyAnnotatedField,
  PyClassDef,
  PyModule,
} from "../types/python.js";
