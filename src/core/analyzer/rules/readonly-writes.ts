/**
 * Read-only Write Rule
 *
 * Model parameters and Data `_in` parameters are inputs; a kernel body must
 * not assign to them, augment them or store into them by subscript.
 *
 * @module
 */

import type { PyExpr } from "../../../types/python.js";
import { renderIssue, type Issue, type WriteToReadonlyIssue } from "../issues.js";
import type { KernelRule } from "./rule.js";

/**
 * Name a write stores into: `x` for `x = ...`, `x[i] = ...` and `x[i][j] = ...`.
 */
export function writtenName(target: PyExpr): string | null {
  if (target.kind === "name") return target.id;
  if (target.kind === "subscript") return writtenName(target.value);
  return null;
}

export const readonlyWriteRule: KernelRule = {
  id: "write-to-readonly",
  description: "Kernels must not write to Model or Data _in parameters",
  check({ fn, params }) {
    const readonly = new Map<string, WriteToReadonlyIssue["family"]>();
    for (const { param, kind } of params) {
      if (kind === "model") readonly.set(param.name, "Model");
      else if (kind === "data-in") readonly.set(param.name, "Data input");
    }
    if (readonly.size === 0) return [];

    const issues: Issue[] = [];
    const seen = new Set<string>();

    for (const write of fn.writes) {
      const name = writtenName(write.target);
      if (name === null) continue;

      const family = readonly.get(name);
      if (!family) continue;

      const issue: Issue = {
        kind: "write-to-readonly",
        line: fn.line,
        kernel: fn.name,
        field: name,
        family,
      };
      const key = renderIssue(issue);
      if (!seen.has(key)) {
        seen.add(key);
        issues.push(issue);
      }
    }
    return issues;
  },
};
