/**
 * Positional Order Rules
 *
 * Parameter order is Model, Data, Data in, Data out, with any other parameter
 * before or after that block. The checks compare group envelopes (min/max
 * index), so one misplaced parameter reports once per rule.
 *
 * @module
 */

import { indicesOf, type ParameterKind } from "../classification.js";
import type { DataGroup, Issue } from "../issues.js";
import type { KernelRule } from "./rule.js";

const FIELD_KINDS: ParameterKind[] = ["model", "data", "data-in", "data-out"];

/** True when some index of `earlier` exceeds some index of `later` */
function outOfOrder(earlier: number[], later: number[]): boolean {
  if (earlier.length === 0 || later.length === 0) return false;
  return Math.max(...earlier) > Math.min(...later);
}

export const sandwichedParamRule: KernelRule = {
  id: "arg-position/sandwiched",
  description: "Parameters that are not Model or Data fields must not sit between them",
  check({ fn, params }) {
    const fieldIndices = indicesOf(params, ...FIELD_KINDS);
    if (fieldIndices.length === 0) return [];

    const first = Math.min(...fieldIndices);
    const last = Math.max(...fieldIndices);

    const issues: Issue[] = [];
    for (const { param, index, kind } of params) {
      if (kind === "other" && index > first && index < last) {
        issues.push({
          kind: "arg-position",
          line: param.line,
          kernel: fn.name,
          reason: { type: "sandwiched", param: param.name },
        });
      }
    }
    return issues;
  },
};

export const modelAfterDataRule: KernelRule = {
  id: "arg-position/model-after-data",
  description: "Model parameters must precede Data parameters",
  check({ fn, params }) {
    const model = indicesOf(params, "model");
    const data = indicesOf(params, "data", "data-in", "data-out");
    if (!outOfOrder(model, data)) return [];
    return [
      {
        kind: "arg-position",
        line: fn.line,
        kernel: fn.name,
        reason: { type: "model-after-data" },
      },
    ];
  },
};

export const dataOrderRule: KernelRule = {
  id: "arg-position/data-order",
  description: "Data parameters must be ordered regular, then _in, then _out",
  check({ fn, params }) {
    const regular = indicesOf(params, "data");
    const dataIn = indicesOf(params, "data-in");
    const dataOut = indicesOf(params, "data-out");

    const orderings: Array<[DataGroup, number[], DataGroup, number[]]> = [
      ["regular Data", regular, "Data _in", dataIn],
      ["Data _in", dataIn, "Data _out", dataOut],
      ["regular Data", regular, "Data _out", dataOut],
    ];

    const issues: Issue[] = [];
    for (const [first, earlier, second, later] of orderings) {
      if (outOfOrder(earlier, later)) {
        issues.push({
          kind: "arg-position",
          line: fn.line,
          kernel: fn.name,
          reason: { type: "data-order", first, second },
        });
      }
    }
    return issues;
  },
};
