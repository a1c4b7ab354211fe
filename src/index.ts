/**
 * Kernel Analyzer
 *
 * Library entry point. The command line lives in `cli/index.ts`.
 *
 * @module
 */

export * from "./core/index.js";
export { toDiagnostic, toDiagnostics, DIAGNOSTIC_SOURCE } from "./lsp/diagnostics.js";
export { registerKernelAnalyzerServer, startLanguageServer } from "./lsp/server.js";
export { runCheck, type CheckOptions, type CheckEnvironment } from "./cli/commands/check.js";
export {
  loadAnalyzerConfig,
  parseAnalyzerConfig,
  type AnalyzerConfig,
  type OutputFormat,
} from "./utils/index.js";
