/**
 * Analyzer Configuration
 *
 * Reads the optional `kernel-analyzer.json` of a project. Relative paths in
 * the file are resolved against the file's directory.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { fileExists, readFileWithEncoding } from "./fs.js";
import {
  AnalyzerConfigSchema,
  formatZodError,
  safeValidate,
  type AnalyzerConfig,
} from "./validation.js";

export const CONFIG_FILE = "kernel-analyzer.json";
export const SCHEMA_ENV = "KERNEL_ANALYZER_SCHEMA";

export interface LoadedConfig {
  config: AnalyzerConfig;
  /** Path of the file read, or null when the defaults were used */
  configPath: string | null;
}

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_FILE);
}

/**
 * Validates a parsed configuration document.
 *
 * @throws ConfigurationError when the document does not match the schema
 */
export function parseAnalyzerConfig(document: unknown, configPath = CONFIG_FILE): AnalyzerConfig {
  const result = safeValidate(AnalyzerConfigSchema, document);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration in ${configPath}: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.CONFIGURATION_ERROR,
      { configPath }
    );
  }

  const config = result.data;
  if (config.schema !== undefined) {
    config.schema = path.resolve(path.dirname(configPath), config.schema);
  }
  return config;
}

/**
 * Loads `kernel-analyzer.json` from the project root, falling back to the
 * defaults when there is none.
 */
export async function loadAnalyzerConfig(
  projectRoot: string = getProjectRoot()
): Promise<LoadedConfig> {
  const configPath = getConfigPath(projectRoot);

  if (!(await fileExists(configPath))) {
    return { config: parseAnalyzerConfig({}, configPath), configPath: null };
  }

  let document: unknown;
  try {
    document = JSON.parse(await readFileWithEncoding(configPath));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIGURATION_ERROR,
      { configPath }
    );
  }

  return { config: parseAnalyzerConfig(document, configPath), configPath };
}

/**
 * Schema path to use: the explicit option, then the configuration file, then
 * the environment.
 */
export function resolveSchemaPath(
  explicit: string | undefined,
  config: AnalyzerConfig
): string | undefined {
  return explicit ?? config.schema ?? (process.env[SCHEMA_ENV] || undefined);
}
