#!/usr/bin/env node

/**
 * Kernel Analyzer CLI
 * Checks @kernel parameter conventions from the command line and editors
 */

import { Command } from "commander";
import chalk from "chalk";
import { checkCommand } from "./commands/check.js";
import { lspCommand } from "./commands/lsp.js";
import { wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("kernel-analyzer")
  .description("Static checks for @kernel parameter conventions")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("check")
  .description("Check Python files for kernel convention issues")
  .argument("[files...]", "Python files, directories or glob patterns")
  .option("-s, --schema <path>", "Model/Data schema (.json or the library's types .py)")
  .option("-o, --output <format>", "Output format (console, github)")
  .option("-v, --verbose", "Enable debug logging")
  .action(checkCommand);

program
  .command("lsp")
  .description("Start the language server on stdio")
  .option("-s, --schema <path>", "Model/Data schema (.json or the library's types .py)")
  .option("-v, --verbose", "Enable debug logging")
  .action(lspCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors gracefully
 */
function handleError(error: unknown): void {
  const wrapped = wrapError(error);
  if (wrapped === error) {
    logger.debug({ err: error }, "CLI error occurred");
  } else {
    logger.error({ err: error }, "CLI error occurred");
  }
  console.error(chalk.red(`Error: ${wrapped.toString()}`));
  if (error instanceof Error && (process.env.DEBUG || process.env.NODE_ENV === "development")) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  process.exit(process.exitCode ?? 0);
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

// Parse command line arguments
program.parseAsync(process.argv).catch(handleError);
