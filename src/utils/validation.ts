/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and schema files at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Kernel Schema File
// =============================================================================

/**
 * Field name to declared type text
 */
const FieldTypesSchema = z
  .record(z.string().min(1), z.string().min(1))
  .refine((fields) => Object.keys(fields).length > 0, {
    message: "must declare at least one field",
  });

/**
 * JSON schema file: `{ "model": { name: type }, "data": { name: type } }`
 */
export const SchemaFileSchema = z.object({
  model: FieldTypesSchema,
  data: FieldTypesSchema,
});

export type SchemaFile = z.infer<typeof SchemaFileSchema>;

// =============================================================================
// Analyzer Configuration
// =============================================================================

/**
 * Report formats of the check command
 */
export const OutputFormatSchema = z.enum(["console", "github"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * kernel-analyzer.json
 */
export const AnalyzerConfigSchema = z
  .object({
    /** Schema file (.json or the kernel library's .py types module) */
    schema: z.string().min(1).optional(),

    /** Name of the Model class when the schema is a Python module */
    modelClass: z.string().min(1).default("Model"),

    /** Name of the Data class when the schema is a Python module */
    dataClass: z.string().min(1).default("Data"),

    /** Report format */
    output: OutputFormatSchema.default("console"),

    /** Glob patterns checked when no files are given */
    include: z.array(z.string().min(1)).default([]),

    /** Glob patterns to exclude */
    ignore: z.array(z.string().min(1)).default([
      "**/node_modules/**",
      "**/.git/**",
      "**/.venv/**",
      "**/build/**",
    ]),
  })
  .strict();

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validation result with either data or error
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
