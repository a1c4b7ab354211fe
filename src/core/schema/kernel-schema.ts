/**
 * Kernel Schema
 *
 * Field names and declared type text of the kernel library's `Model` and
 * `Data` entities. Built once per process and read-only afterwards.
 *
 * @module
 */

import { ErrorCode, SchemaError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type FieldFamily = "Model" | "Data";

/** Field name to declared type text */
export type FieldTypes = ReadonlyMap<string, string>;

export type DataSuffix = "_in" | "_out";

export const DATA_IN_SUFFIX: DataSuffix = "_in";
export const DATA_OUT_SUFFIX: DataSuffix = "_out";

/**
 * A name split into its base and a trailing `_in` / `_out`.
 */
export interface SuffixedName {
  readonly base: string;
  readonly suffix: DataSuffix;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Splits a trailing `_in` / `_out` off a name. Returns null when the name has
 * neither suffix or nothing would remain.
 */
export function splitDataSuffix(name: string): SuffixedName | null {
  for (const suffix of [DATA_IN_SUFFIX, DATA_OUT_SUFFIX]) {
    if (name.endsWith(suffix) && name.length > suffix.length) {
      return { base: name.slice(0, -suffix.length), suffix };
    }
  }
  return null;
}

function toFieldMap(
  family: FieldFamily,
  fields: Iterable<readonly [string, string]>
): Map<string, string> {
  const map = new Map<string, string>();
  for (const [name, type] of fields) {
    if (splitDataSuffix(name)) {
      throw new SchemaError(
        `${family} field '${name}' must not end in '${DATA_IN_SUFFIX}' or '${DATA_OUT_SUFFIX}'`,
        ErrorCode.SCHEMA_INVALID,
        { family, field: name }
      );
    }
    map.set(name, type);
  }
  if (map.size === 0) {
    throw new SchemaError(`${family} has no fields`, ErrorCode.SCHEMA_INVALID, { family });
  }
  return map;
}

// =============================================================================
// Kernel Schema Class
// =============================================================================

/**
 * Immutable Model/Data field registry.
 *
 * @example
 * ```typescript
 * const schema = KernelSchema.fromRecords(
 *   { qpos0: "wp.array(dtype=float)" },
 *   { qpos: "wp.array2d(dtype=float)" }
 * );
 * schema.expandedDataFields().get("qpos_out"); // "wp.array2d(dtype=float)"
 * ```
 */
export class KernelSchema {
  private readonly model: Map<string, string>;
  private readonly data: Map<string, string>;
  private readonly expanded: Map<string, string>;

  /**
   * @throws SchemaError when an entity is empty or a canonical name carries a
   *   data suffix
   */
  constructor(
    model: Iterable<readonly [string, string]>,
    data: Iterable<readonly [string, string]>
  ) {
    this.model = toFieldMap("Model", model);
    this.data = toFieldMap("Data", data);

    this.expanded = new Map(this.data);
    for (const [name, type] of this.data) {
      this.expanded.set(`${name}${DATA_IN_SUFFIX}`, type);
      this.expanded.set(`${name}${DATA_OUT_SUFFIX}`, type);
    }
  }

  static fromRecords(
    model: Readonly<Record<string, string>>,
    data: Readonly<Record<string, string>>
  ): KernelSchema {
    return new KernelSchema(Object.entries(model), Object.entries(data));
  }

  /** Canonical Model fields */
  modelFields(): FieldTypes {
    return this.model;
  }

  /** Canonical Data fields */
  dataFields(): FieldTypes {
    return this.data;
  }

  /** Canonical Data fields plus their `_in` and `_out` variants */
  expandedDataFields(): FieldTypes {
    return this.expanded;
  }

  isModelField(name: string): boolean {
    return this.model.has(name);
  }

  isDataField(name: string): boolean {
    return this.data.has(name);
  }

  /**
   * Finds the field a parameter name refers to, directly or through an
   * `_in` / `_out` suffix. Model takes precedence over Data.
   */
  lookupField(name: string): { family: FieldFamily; name: string; type: string } | null {
    const candidates = [name];
    const split = splitDataSuffix(name);
    if (split) candidates.push(split.base);

    for (const candidate of candidates) {
      const modelType = this.model.get(candidate);
      if (modelType !== undefined) {
        return { family: "Model", name: candidate, type: modelType };
      }
      const dataType = this.data.get(candidate);
      if (dataType !== undefined) {
        return { family: "Data", name: candidate, type: dataType };
      }
    }
    return null;
  }
}
