/**
 * Kernel Detection
 *
 * @module
 */

import type { PyFunctionDef } from "../../types/python.js";

export const KERNEL_DECORATOR = "kernel";

/**
 * A function is a kernel when it is decorated with the bare name `kernel`.
 * `@wp.kernel`, `@kernel(...)` and other names do not count.
 */
export function isKernel(fn: PyFunctionDef): boolean {
  return fn.decorators.some(
    (decorator) => decorator.kind === "name" && decorator.id === KERNEL_DECORATOR
  );
}
