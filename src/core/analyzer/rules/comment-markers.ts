/**
 * Comment Marker Rule
 *
 * The first parameter of each family sits under a marker comment:
 *
 * ```python
 * @kernel
 * def step(
 *   # Model
 *   qpos0: wp.array(dtype=float),
 *   # Data in
 *   qvel_in: wp.array2d(dtype=float),
 * ):
 * ```
 *
 * The marker is looked for in the raw source line just above the parameter.
 *
 * @module
 */

import type { ParameterKind } from "../classification.js";
import type { CommentCategory, MissingCommentIssue } from "../issues.js";
import type { KernelRule } from "./rule.js";

const CATEGORIES: ReadonlyArray<[ParameterKind, CommentCategory]> = [
  ["model", "Model"],
  ["data", "Data"],
  ["data-in", "Data in"],
  ["data-out", "Data out"],
];

export function commentMarker(category: CommentCategory): string {
  return `# ${category}`;
}

export const commentMarkerRule: KernelRule = {
  id: "missing-comment",
  description: "The first parameter of each family must be preceded by its marker comment",
  check({ fn, params, sourceLines }) {
    const issues: MissingCommentIssue[] = [];

    for (const [kind, category] of CATEGORIES) {
      const first = params.find((p) => p.kind === kind);
      if (!first) continue;

      const previousLine = sourceLines[first.param.line - 2] ?? "";
      if (!previousLine.includes(commentMarker(category))) {
        issues.push({
          kind: "missing-comment",
          line: first.param.line,
          kernel: fn.name,
          param: first.param.name,
          category,
        });
      }
    }

    // stable: categories on the same line keep their family order
    return issues.sort((a, b) => a.line - b.line);
  },
};
