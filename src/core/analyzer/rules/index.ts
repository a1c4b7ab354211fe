/**
 * Kernel Rules Module
 *
 * @module
 */

export type { KernelRule, RuleContext } from "./rule.js";

export { defaultsParamsRule, varargsRule, kwargsRule } from "./signature-shape.js";
export { typeAnnotationRule, typeMismatchRule, annotationTypeName } from "./type-annotations.js";
export { modelFieldSuffixRule, dataFieldSuffixRule } from "./naming-suffix.js";
export { sandwichedParamRule, modelAfterDataRule, dataOrderRule } from "./positional-order.js";
export { commentMarkerRule, commentMarker } from "./comment-markers.js";
export { readonlyWriteRule, writtenName } from "./readonly-writes.js";

import { defaultsParamsRule, varargsRule, kwargsRule } from "./signature-shape.js";
import { typeAnnotationRule, typeMismatchRule } from "./type-annotations.js";
import { modelFieldSuffixRule, dataFieldSuffixRule } from "./naming-suffix.js";
import { sandwichedParamRule, modelAfterDataRule, dataOrderRule } from "./positional-order.js";
import { commentMarkerRule } from "./comment-markers.js";
import { readonlyWriteRule } from "./readonly-writes.js";
import type { KernelRule } from "./rule.js";

/**
 * Every rule, in reporting order: signature shape, annotations, naming,
 * positions, comments, read-only writes.
 */
export const DEFAULT_RULES: readonly KernelRule[] = [
  defaultsParamsRule,
  varargsRule,
  kwargsRule,
  typeAnnotationRule,
  typeMismatchRule,
  modelFieldSuffixRule,
  dataFieldSuffixRule,
  sandwichedParamRule,
  modelAfterDataRule,
  dataOrderRule,
  commentMarkerRule,
  readonlyWriteRule,
];
