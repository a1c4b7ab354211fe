/**
 * Schema Loader
 *
 * Builds a KernelSchema from a JSON file or from the kernel library's Python
 * types module (annotated attributes of its `Model` and `Data` classes).
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ErrorCode, SchemaError, isKernelAnalyzerError } from "../errors.js";
import { KernelSchema } from "./kernel-schema.js";
import { PythonReader } from "../parser/python-reader.js";
import { renderExpression } from "../parser/expression-text.js";
import type { ParserManager } from "../parser/parser-manager.js";
import type { Tree } from "web-tree-sitter";
import type { PyClassDef, PyModule } from "../../types/python.js";
import { SchemaFileSchema, formatZodError, safeValidate } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("schema");

// =============================================================================
// Types
// =============================================================================

export interface PythonSchemaOptions {
  /** Name of the Model class (default "Model") */
  modelClass?: string;
  /** Name of the Data class (default "Data") */
  dataClass?: string;
}

export interface LoadSchemaOptions extends PythonSchemaOptions {
  /** Initialized parser, required for Python schema sources */
  parser?: ParserManager;
}

// =============================================================================
// JSON Source
// =============================================================================

/**
 * Builds a schema from parsed JSON.
 *
 * @throws SchemaError when the document does not match the schema file shape
 */
export function schemaFromJson(document: unknown, source = "<json>"): KernelSchema {
  const result = safeValidate(SchemaFileSchema, document);
  if (!result.success) {
    throw new SchemaError(
      `Invalid schema ${source}: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.SCHEMA_INVALID,
      { schemaPath: source }
    );
  }
  return KernelSchema.fromRecords(result.data.model, result.data.data);
}

// =============================================================================
// Python Source
// =============================================================================

function classFields(classes: readonly PyClassDef[], name: string, source: string): [string, string][] {
  const cls = classes.find((candidate) => candidate.name === name);
  if (!cls) {
    throw new SchemaError(`Class '${name}' not found in ${source}`, ErrorCode.SCHEMA_INVALID, {
      schemaPath: source,
    });
  }
  return cls.fields.map((field) => [field.name, renderExpression(field.annotation)]);
}

/**
 * Builds a schema from the source of a Python types module.
 *
 * @example
 * ```typescript
 * const schema = schemaFromPython(parser, `
 * class Model:
 *   qpos0: wp.array(dtype=float)
 *
 * class Data:
 *   qpos: wp.array2d(dtype=float)
 * `);
 * ```
 */
export function schemaFromPython(
  parser: ParserManager,
  code: string,
  source = "<python>",
  options: PythonSchemaOptions = {}
): KernelSchema {
  const { modelClass = "Model", dataClass = "Data" } = options;

  let tree: Tree | null = null;
  let parsed: PyModule;
  try {
    tree = parser.parse(code, source);
    parsed = new PythonReader().read(tree);
  } catch (error) {
    throw new SchemaError(`Cannot parse ${source}`, ErrorCode.SCHEMA_INVALID, {
      schemaPath: source,
      cause: error instanceof Error ? error.message : String(error),
    });
  } finally {
    tree?.delete();
  }

  return new KernelSchema(
    classFields(parsed.classes, modelClass, source),
    classFields(parsed.classes, dataClass, source)
  );
}

// =============================================================================
// File Loading
// =============================================================================

/**
 * Loads a schema file. `.json` files hold field maps; `.py` / `.pyi` files are
 * read as the kernel library's types module.
 *
 * @throws SchemaError when the file is unreadable, of an unknown kind, or invalid
 */
export async function loadSchema(
  schemaPath: string,
  options: LoadSchemaOptions = {}
): Promise<KernelSchema> {
  const resolved = path.resolve(schemaPath);
  const extension = path.extname(resolved).toLowerCase();

  let content: string;
  try {
    content = await fs.readFile(resolved, "utf-8");
  } catch (error) {
    throw new SchemaError(`Cannot read schema ${resolved}`, ErrorCode.SCHEMA_UNREADABLE, {
      schemaPath: resolved,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let schema: KernelSchema;
  try {
    if (extension === ".json") {
      schema = schemaFromJson(JSON.parse(content), resolved);
    } else if (extension === ".py" || extension === ".pyi") {
      if (!options.parser) {
        throw new SchemaError(
          "A parser is required to load a Python schema",
          ErrorCode.SCHEMA_INVALID,
          { schemaPath: resolved }
        );
      }
      schema = schemaFromPython(options.parser, content, resolved, options);
    } else {
      throw new SchemaError(
        `Unsupported schema file type: ${extension || "(none)"}`,
        ErrorCode.SCHEMA_INVALID,
        { schemaPath: resolved }
      );
    }
  } catch (error) {
    if (isKernelAnalyzerError(error)) throw error;
    // JSON.parse
    throw new SchemaError(
      `Invalid schema ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.SCHEMA_INVALID,
      { schemaPath: resolved }
    );
  }

  logger.debug(
    {
      schemaPath: resolved,
      modelFields: schema.modelFields().size,
      dataFields: schema.dataFields().size,
    },
    "Schema loaded"
  );
  return schema;
}
