/**
 * Expression Text
 *
 * Renders reduced Python expressions back to canonical source text. Kernel
 * annotations and schema field types both go through here, so they compare
 * as plain strings.
 *
 * @module
 */

import type { PyExpr, PyKeyword } from "../../types/python.js";

/**
 * Renders an expression: `wp.array(dtype=wp.float32, ndim=1)`.
 *
 * Attribute chains, call arguments and keywords are rendered recursively and
 * literals by value. Shapes outside the reduced model render as their node
 * category, e.g. `binary_operator`.
 */
export function renderExpression(expr: PyExpr): string {
  switch (expr.kind) {
    case "name":
      return expr.id;
    case "attribute":
      return `${renderExpression(expr.value)}.${expr.attr}`;
    case "call": {
      const parts = [
        ...expr.args.map(renderExpression),
        ...expr.keywords.map(renderKeyword),
      ];
      return `${renderExpression(expr.func)}(${parts.join(", ")})`;
    }
    case "constant":
      return expr.value;
    case "subscript":
      return "subscript";
    case "other":
      return expr.nodeType;
  }
}

function renderKeyword(keyword: PyKeyword): string {
  const value = renderExpression(keyword.value);
  return keyword.arg === null ? `**${value}` : `${keyword.arg}=${value}`;
}

/**
 * The last identifier of a name or attribute chain: `wp.array` -> `array`.
 * Null for any other shape.
 */
export function terminalName(expr: PyExpr): string | null {
  if (expr.kind === "name") return expr.id;
  if (expr.kind === "attribute") return expr.attr;
  return null;
}
