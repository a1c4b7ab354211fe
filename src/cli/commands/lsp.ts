/**
 * lsp command - Serve kernel diagnostics to editors over stdio
 */

import * as path from "node:path";
import { createKernelAnalyzer } from "../../core/analyzer/index.js";
import { ErrorCode, SchemaError } from "../../core/errors.js";
import { startLanguageServer } from "../../lsp/server.js";
import {
  createLogger,
  loadAnalyzerConfig,
  resolveSchemaPath,
  setLogLevel,
} from "../../utils/index.js";

const logger = createLogger("lsp");

export interface LspOptions {
  schema?: string;
  verbose?: boolean;
}

export async function lspCommand(options: LspOptions): Promise<void> {
  if (options.verbose) {
    setLogLevel("debug");
  }

  const { config } = await loadAnalyzerConfig();
  const schemaPath = resolveSchemaPath(options.schema, config);
  if (!schemaPath) {
    throw new SchemaError(
      "No schema configured. Use --schema, 'schema' in kernel-analyzer.json or KERNEL_ANALYZER_SCHEMA.",
      ErrorCode.SCHEMA_NOT_CONFIGURED
    );
  }

  logger.info({ schemaPath }, "Starting language server");
  const analyzer = await createKernelAnalyzer({
    schema: path.resolve(schemaPath),
    modelClass: config.modelClass,
    dataClass: config.dataClass,
  });
  startLanguageServer(analyzer);
}
