/**
 * Kernel Issues
 *
 * The closed set of findings the kernel rules report. Every issue carries the
 * line and name of its kernel (or the line of the offending parameter) and
 * renders to one line: `<line>: Kernel '<name>' <description>`.
 *
 * @module
 */

import type { FieldFamily, DataSuffix } from "../schema/kernel-schema.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Annotation type names a kernel parameter may use.
 */
export const ALLOWED_TYPES = [
  "int",
  "float",
  "bool",
  "array",
  "array2d",
  "array2df",
  "array3d",
  "array3df",
] as const;

export type AllowedType = (typeof ALLOWED_TYPES)[number];

export function isAllowedType(name: string): name is AllowedType {
  return ALLOWED_TYPES.some((allowed) => allowed === name);
}

/**
 * Parameter categories that each need a marker comment above their first
 * member.
 */
export type CommentCategory = "Model" | "Data" | "Data in" | "Data out";

/** Data parameter groups, in their required order */
export type DataGroup = "regular Data" | "Data _in" | "Data _out";

// =============================================================================
// Issue Variants
// =============================================================================

interface IssueBase {
  /** 1-based source line */
  readonly line: number;
  /** Name of the kernel the issue belongs to */
  readonly kernel: string;
}

export interface DefaultsParamsIssue extends IssueBase {
  readonly kind: "defaults-params";
}

export interface VarargsIssue extends IssueBase {
  readonly kind: "varargs";
}

export interface KwargsIssue extends IssueBase {
  readonly kind: "kwargs";
}

export interface TypeIssue extends IssueBase {
  readonly kind: "type";
  readonly param: string;
  /** Derived type name; empty when the parameter is unannotated */
  readonly actual: string;
  readonly allowed: readonly string[];
}

export interface TypeMismatchIssue extends IssueBase {
  readonly kind: "type-mismatch";
  readonly param: string;
  readonly actual: string;
  readonly expected: string;
  readonly family: FieldFamily;
}

export type ArgPositionReason =
  | { readonly type: "sandwiched"; readonly param: string }
  | { readonly type: "model-after-data" }
  | {
      readonly type: "data-order";
      /** Group that must come first */
      readonly first: DataGroup;
      /** Group found ahead of it */
      readonly second: DataGroup;
    };

export interface ArgPositionIssue extends IssueBase {
  readonly kind: "arg-position";
  readonly reason: ArgPositionReason;
}

export interface ModelFieldSuffixIssue extends IssueBase {
  readonly kind: "model-field-suffix";
  readonly param: string;
  readonly suffix: DataSuffix;
}

export interface DataFieldSuffixIssue extends IssueBase {
  readonly kind: "data-field-suffix";
  readonly param: string;
  /** The Data field the name starts with */
  readonly field: string;
}

export interface MissingCommentIssue extends IssueBase {
  readonly kind: "missing-comment";
  readonly param: string;
  readonly category: CommentCategory;
}

export interface WriteToReadonlyIssue extends IssueBase {
  readonly kind: "write-to-readonly";
  readonly field: string;
  readonly family: "Model" | "Data input";
}

/**
 * A kernel finding.
 */
export type Issue =
  | DefaultsParamsIssue
  | VarargsIssue
  | KwargsIssue
  | TypeIssue
  | TypeMismatchIssue
  | ArgPositionIssue
  | ModelFieldSuffixIssue
  | DataFieldSuffixIssue
  | MissingCommentIssue
  | WriteToReadonlyIssue;

export type IssueKind = Issue["kind"];

// =============================================================================
// Codes
// =============================================================================

/**
 * Stable diagnostic codes, one per kind.
 */
export const ISSUE_CODES: Readonly<Record<IssueKind, string>> = {
  "arg-position": "KA0000",
  "data-field-suffix": "KA0001",
  "defaults-params": "KA0002",
  kwargs: "KA0003",
  "missing-comment": "KA0004",
  "model-field-suffix": "KA0005",
  type: "KA0006",
  "type-mismatch": "KA0007",
  varargs: "KA0008",
  "write-to-readonly": "KA0009",
};

export function issueCode(issue: Issue): string {
  return ISSUE_CODES[issue.kind];
}

// =============================================================================
// Rendering
// =============================================================================

function describeArgPosition(reason: ArgPositionReason): string {
  switch (reason.type) {
    case "sandwiched":
      return `param: ${reason.param} is not a Model or Data field and must not sit between Model/Data params`;
    case "model-after-data":
      return "has Model params after Data params";
    case "data-order":
      return `has ${reason.second} params before ${reason.first} params`;
  }
}

/**
 * The part of the rendered issue after the kernel name.
 */
export function describeIssue(issue: Issue): string {
  switch (issue.kind) {
    case "defaults-params":
      return "has default params";
    case "varargs":
      return "has varargs";
    case "kwargs":
      return "has kwargs";
    case "type": {
      const allowed = `(allowed: ${issue.allowed.join(", ")})`;
      return issue.actual
        ? `param: ${issue.param} has unexpected annotation: ${issue.actual} ${allowed}`
        : `param: ${issue.param} missing type annotation ${allowed}`;
    }
    case "type-mismatch":
      return `param: ${issue.param} type mismatch: ${issue.actual} (${issue.family} field expects ${issue.expected})`;
    case "arg-position":
      return describeArgPosition(issue.reason);
    case "model-field-suffix":
      return `param: ${issue.param} is a Model field and must not have suffix '${issue.suffix}'`;
    case "data-field-suffix":
      return `param: ${issue.param} looks like Data field '${issue.field}' but does not end in '_in' or '_out'`;
    case "missing-comment":
      return `param: ${issue.param} is the first ${issue.category} param and must be preceded by a '# ${issue.category}' comment`;
    case "write-to-readonly":
      return `writes to read-only ${issue.family} field: ${issue.field}`;
  }
}

/**
 * Renders an issue to its single report line.
 *
 * @example
 * ```typescript
 * renderIssue({ kind: "varargs", line: 5, kernel: "step" });
 * // "5: Kernel 'step' has varargs"
 * ```
 */
export function renderIssue(issue: Issue): string {
  return `${issue.line}: Kernel '${issue.kernel}' ${describeIssue(issue)}`;
}
