/**
 * Python Syntax Model
 *
 * The subset of a Python syntax tree the kernel rules read: function
 * definitions with their decorators, parameters, annotations and the write
 * sites of their bodies, plus annotated class attributes for schema loading.
 * Produced from a Tree-sitter tree by the syntax reader.
 *
 * @module
 */

// =============================================================================
// Expressions
// =============================================================================

/**
 * An expression, reduced to the shapes annotations and decorators use.
 * Anything else is kept as `other` with its node category.
 */
export type PyExpr =
  | PyName
  | PyAttribute
  | PyCall
  | PyConstant
  | PySubscript
  | PyOtherExpr;

/** A bare identifier, e.g. `kernel` or `array2d` */
export interface PyName {
  readonly kind: "name";
  readonly id: string;
}

/** Attribute access, e.g. `wp.float32` */
export interface PyAttribute {
  readonly kind: "attribute";
  readonly value: PyExpr;
  readonly attr: string;
}

/** A call, e.g. `wp.array(dtype=wp.float32, ndim=1)` */
export interface PyCall {
  readonly kind: "call";
  readonly func: PyExpr;
  readonly args: readonly PyExpr[];
  readonly keywords: readonly PyKeyword[];
}

/** Keyword argument of a call; `arg` is null for `**mapping` */
export interface PyKeyword {
  readonly arg: string | null;
  readonly value: PyExpr;
}

export type PyLiteralKind = "string" | "number" | "keyword";

/** A literal, holding the text Python's str() gives for its value */
export interface PyConstant {
  readonly kind: "constant";
  readonly literal: PyLiteralKind;
  readonly value: string;
}

/** Subscription, e.g. `qpos[worldid, 0]` */
export interface PySubscript {
  readonly kind: "subscript";
  readonly value: PyExpr;
}

/** Any other expression */
export interface PyOtherExpr {
  readonly kind: "other";
  /** Node category, e.g. "binary_operator" */
  readonly nodeType: string;
  readonly text: string;
}

// =============================================================================
// Function Definitions
// =============================================================================

/**
 * A named parameter. Catch-all parameters (`*args`, `**kwargs`) are kept on
 * the function instead.
 */
export interface PyParameter {
  readonly name: string;
  readonly annotation: PyExpr | null;
  readonly hasDefault: boolean;
  readonly keywordOnly: boolean;
  /** 1-based line of the parameter's declaration */
  readonly line: number;
}

/**
 * A store found in a function body: `x = ...`, `x += ...` or `x[i] = ...`.
 */
export interface PyWrite {
  readonly target: PyExpr;
}

export interface PyFunctionDef {
  readonly name: string;
  /** 1-based line of the `def` keyword */
  readonly line: number;
  readonly decorators: readonly PyExpr[];
  readonly params: readonly PyParameter[];
  /** Name of the `*args` parameter, if declared */
  readonly vararg: string | null;
  /** Name of the `**kwargs` parameter, if declared */
  readonly kwarg: string | null;
  /** Writes anywhere in the body, nested blocks included, in source order */
  readonly writes: readonly PyWrite[];
}

// =============================================================================
// Classes
// =============================================================================

/**
 * An annotated class attribute, e.g. `qpos0: wp.array(dtype=float)`.
 */
export interface PyAnnotatedField {
  readonly name: string;
  readonly annotation: PyExpr;
  readonly line: number;
}

export interface PyClassDef {
  readonly name: string;
  readonly line: number;
  readonly fields: readonly PyAnnotatedField[];
}

// =============================================================================
// Module
// =============================================================================

export interface PyModule {
  /** Every function definition, nested ones and methods included, in pre-order */
  readonly functions: readonly PyFunctionDef[];
  /** Every class definition, in pre-order */
  readonly classes: readonly PyClassDef[];
}
