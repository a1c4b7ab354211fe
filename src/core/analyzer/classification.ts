/**
 * Parameter Classification
 *
 * Sorts every kernel parameter into exactly one family, once, so that all
 * rules agree on what a parameter is.
 *
 * @module
 */

import type { PyParameter } from "../../types/python.js";
import {
  DATA_IN_SUFFIX,
  DATA_OUT_SUFFIX,
  splitDataSuffix,
  type KernelSchema,
} from "../schema/kernel-schema.js";

export type ParameterKind = "model" | "data" | "data-in" | "data-out" | "other";

export interface ClassifiedParameter {
  readonly param: PyParameter;
  /** Position in the parameter list */
  readonly index: number;
  readonly kind: ParameterKind;
}

/**
 * Classifies one parameter name. Model wins over Data when a name is both.
 */
export function classifyName(name: string, schema: KernelSchema): ParameterKind {
  if (schema.isModelField(name)) return "model";
  if (schema.isDataField(name)) return "data";

  const split = splitDataSuffix(name);
  if (split && schema.isDataField(split.base)) {
    if (split.suffix === DATA_IN_SUFFIX) return "data-in";
    if (split.suffix === DATA_OUT_SUFFIX) return "data-out";
  }
  return "other";
}

export function classifyParameters(
  params: readonly PyParameter[],
  schema: KernelSchema
): ClassifiedParameter[] {
  return params.map((param, index) => ({
    param,
    index,
    kind: classifyName(param.name, schema),
  }));
}

/**
 * Indices of the parameters of the given kinds.
 */
export function indicesOf(
  params: readonly ClassifiedParameter[],
  ...kinds: ParameterKind[]
): number[] {
  return params.filter((p) => kinds.includes(p.kind)).map((p) => p.index);
}
