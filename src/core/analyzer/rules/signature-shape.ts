/**
 * Signature Shape Rules
 *
 * Kernels take a fixed list of named parameters: no defaults and no
 * catch-alls. Each rule reports at most once per kernel.
 *
 * @module
 */

import type { KernelRule } from "./rule.js";

export const defaultsParamsRule: KernelRule = {
  id: "defaults-params",
  description: "Kernel parameters must not have default values",
  check({ fn }) {
    if (!fn.params.some((param) => param.hasDefault)) return [];
    return [{ kind: "defaults-params", line: fn.line, kernel: fn.name }];
  },
};

export const varargsRule: KernelRule = {
  id: "varargs",
  description: "Kernels must not declare *args",
  check({ fn }) {
    if (fn.vararg === null) return [];
    return [{ kind: "varargs", line: fn.line, kernel: fn.name }];
  },
};

export const kwargsRule: KernelRule = {
  id: "kwargs",
  description: "Kernels must not declare **kwargs",
  check({ fn }) {
    if (fn.kwarg === null) return [];
    return [{ kind: "kwargs", line: fn.line, kernel: fn.name }];
  },
};
