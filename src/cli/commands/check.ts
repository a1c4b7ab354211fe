/**
 * check command - Analyze Python files for kernel convention issues
 */

import * as path from "node:path";
import { createKernelAnalyzer, type KernelAnalyzer } from "../../core/analyzer/index.js";
import { ConfigurationError, ErrorCode, SchemaError } from "../../core/errors.js";
import {
  createLogger,
  expandFileArguments,
  fileExists,
  formatZodError,
  isPythonFile,
  loadAnalyzerConfig,
  readFileWithEncoding,
  resolveSchemaPath,
  safeValidate,
  setLogLevel,
  OutputFormatSchema,
  type AnalyzerConfig,
  type OutputFormat,
} from "../../utils/index.js";
import { createReporter, processSink, type ReportSink, type ReporterOptions } from "../reporters.js";

const logger = createLogger("check");

export interface CheckOptions {
  schema?: string;
  output?: string;
  verbose?: boolean;
}

export interface CheckEnvironment extends ReporterOptions {
  /** Directory relative paths and the configuration file are resolved against */
  cwd?: string;
  sink?: ReportSink;
  /** Analyzer to use instead of creating one from the schema */
  analyzer?: KernelAnalyzer;
}

export const SKIPPED_NON_PYTHON = "Skipping non-Python file";

function resolveOutputFormat(option: string | undefined, config: AnalyzerConfig): OutputFormat {
  if (option === undefined) return config.output;
  const result = safeValidate(OutputFormatSchema, option);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid output format '${option}': ${formatZodError(result.error).join("; ")}`,
      ErrorCode.CONFIGURATION_ERROR
    );
  }
  return result.data;
}

/**
 * Runs the check and returns the exit code: 0 when every file was analyzed
 * and no issue was found, 1 otherwise.
 *
 * @throws KernelAnalyzerError when the configuration or schema is unusable
 */
export async function runCheck(
  files: string[],
  options: CheckOptions,
  env: CheckEnvironment = {}
): Promise<number> {
  const cwd = env.cwd ?? process.cwd();
  const sink = env.sink ?? processSink;

  const { config, configPath } = await loadAnalyzerConfig(cwd);
  const output = resolveOutputFormat(options.output, config);
  const reporter = createReporter(output, sink, { color: env.color });
  logger.debug({ configPath, output }, "Configuration loaded");

  const patterns = files.length > 0 ? files : config.include;
  if (patterns.length === 0) {
    throw new ConfigurationError(
      "No files specified. Pass files to check or set 'include' in kernel-analyzer.json.",
      ErrorCode.CONFIGURATION_ERROR
    );
  }
  const targets = await expandFileArguments(patterns, { ignore: config.ignore, cwd });

  let analyzer = env.analyzer;
  if (!analyzer) {
    const schemaPath = resolveSchemaPath(options.schema, config);
    if (!schemaPath) {
      throw new SchemaError(
        "No schema configured. Use --schema, 'schema' in kernel-analyzer.json or KERNEL_ANALYZER_SCHEMA.",
        ErrorCode.SCHEMA_NOT_CONFIGURED
      );
    }
    analyzer = await createKernelAnalyzer({
      schema: path.resolve(cwd, schemaPath),
      modelClass: config.modelClass,
      dataClass: config.dataClass,
    });
  }

  let issueCount = 0;
  let skipped = false;

  try {
    for (const file of targets) {
      const filePath = path.resolve(cwd, file);

      if (!isPythonFile(file) || !(await fileExists(filePath))) {
        reporter.skipped(file, SKIPPED_NON_PYTHON);
        skipped = true;
        continue;
      }

      logger.info({ file }, "Checking file");
      try {
        const content = await readFileWithEncoding(filePath);
        const issues = analyzer.analyze(content, file);
        issueCount += issues.length;
        for (const issue of issues) {
          reporter.issue(file, issue);
        }
      } catch (error) {
        logger.error({ err: error, file }, "Error processing file");
        reporter.failure(
          file,
          `Error processing file: ${error instanceof Error ? error.message : String(error)}`
        );
        return 1;
      }
    }
  } finally {
    if (!env.analyzer) {
      await analyzer.close();
    }
  }

  reporter.summary(issueCount, targets.length);
  return issueCount > 0 || skipped ? 1 : 0;
}

/**
 * Commander action for `kernel-analyzer check`
 */
export async function checkCommand(files: string[], options: CheckOptions): Promise<void> {
  if (options.verbose) {
    setLogLevel("debug");
  }
  logger.info({ files, options }, "Running check");
  process.exitCode = await runCheck(files, options);
}
