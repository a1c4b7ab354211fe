/**
 * Rule interface and context
 */

import type { PyFunctionDef } from "../../../types/python.js";
import type { KernelSchema } from "../../schema/kernel-schema.js";
import type { ClassifiedParameter } from "../classification.js";
import type { Issue } from "../issues.js";

/**
 * Context provided to rules for analysis
 */
export interface RuleContext {
  /** The kernel being analyzed */
  fn: PyFunctionDef;
  /** Its parameters, classified against the schema */
  params: readonly ClassifiedParameter[];
  schema: KernelSchema;
  /** Source lines of the file; line N is at index N - 1 */
  sourceLines: readonly string[];
}

/**
 * A stateless check over one kernel
 */
export interface KernelRule {
  /** Unique rule ID */
  id: string;
  /** Description of what the rule checks */
  description: string;
  /** Execute the rule check */
  check(context: RuleContext): Issue[];
}
