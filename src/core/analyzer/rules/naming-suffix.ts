/**
 * Naming Suffix Rules
 *
 * Only Data fields take the `_in` / `_out` suffixes.
 *
 * @module
 */

import { splitDataSuffix } from "../../schema/kernel-schema.js";
import type { Issue } from "../issues.js";
import type { KernelRule } from "./rule.js";

export const modelFieldSuffixRule: KernelRule = {
  id: "model-field-suffix",
  description: "Model fields must not carry an _in or _out suffix",
  check({ fn, schema }) {
    const issues: Issue[] = [];
    for (const param of fn.params) {
      const split = splitDataSuffix(param.name);
      if (split && schema.isModelField(split.base)) {
        issues.push({
          kind: "model-field-suffix",
          line: param.line,
          kernel: fn.name,
          param: param.name,
          suffix: split.suffix,
        });
      }
    }
    return issues;
  },
};

/**
 * Flags names such as `qvel_invalid`: they start with a Data field and an
 * underscore but are not one of the field's valid forms. The prefix test is a
 * plain `startsWith`, so `act_foobar` matches field `act` as well, and Model
 * fields such as `qpos_spring` match Data field `qpos`.
 */
export const dataFieldSuffixRule: KernelRule = {
  id: "data-field-suffix",
  description: "Names starting with a Data field must end in _in or _out",
  check({ fn, params, schema }) {
    const issues: Issue[] = [];
    for (const { param, kind } of params) {
      if (kind === "data" || kind === "data-in" || kind === "data-out") continue;
      if (splitDataSuffix(param.name)) continue;

      for (const field of schema.dataFields().keys()) {
        if (param.name.startsWith(`${field}_`)) {
          issues.push({
            kind: "data-field-suffix",
            line: param.line,
            kernel: fn.name,
            param: param.name,
            field,
          });
          break;
        }
      }
    }
    return issues;
  },
};
