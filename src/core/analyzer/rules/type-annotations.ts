/**
 * Type Annotation Rules
 *
 * @module
 */

import type { PyExpr } from "../../../types/python.js";
import { renderExpression, terminalName } from "../../parser/expression-text.js";
import { ALLOWED_TYPES, isAllowedType, type Issue } from "../issues.js";
import type { KernelRule } from "./rule.js";

/**
 * Type name of an annotation: `int` -> `int`, `wp.array2d` -> `array2d`,
 * `wp.array(dtype=float)` -> `array`, `"int"` -> `'int'`. Empty when there
 * is no annotation.
 */
export function annotationTypeName(annotation: PyExpr | null): string {
  if (annotation === null) return "";
  if (annotation.kind === "constant" && annotation.literal === "string") {
    return `'${annotation.value}'`;
  }
  if (annotation.kind === "call") {
    return terminalName(annotation.func) ?? renderExpression(annotation.func);
  }
  return terminalName(annotation) ?? renderExpression(annotation);
}

export const typeAnnotationRule: KernelRule = {
  id: "type",
  description: "Kernel parameters must be annotated with a scalar or array type",
  check({ fn }) {
    const issues: Issue[] = [];
    for (const param of fn.params) {
      const actual = annotationTypeName(param.annotation);
      if (!isAllowedType(actual)) {
        issues.push({
          kind: "type",
          line: param.line,
          kernel: fn.name,
          param: param.name,
          actual,
          allowed: ALLOWED_TYPES,
        });
      }
    }
    return issues;
  },
};

export const typeMismatchRule: KernelRule = {
  id: "type-mismatch",
  description: "Annotations of Model and Data parameters must match the field's declared type",
  check({ fn, schema }) {
    const issues: Issue[] = [];
    for (const param of fn.params) {
      // unannotated parameters are reported by the type rule
      if (param.annotation === null) continue;

      const field = schema.lookupField(param.name);
      if (!field) continue;

      const actual = renderExpression(param.annotation);
      if (actual !== field.type) {
        issues.push({
          kind: "type-mismatch",
          line: param.line,
          kernel: fn.name,
          param: param.name,
          actual,
          expected: field.type,
          family: field.family,
        });
      }
    }
    return issues;
  },
};
