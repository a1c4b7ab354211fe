/**
 * Check Reporters
 *
 * Console output goes to stderr for people; GitHub output goes to stdout as
 * workflow commands, which annotate the lines of a pull request.
 */

import chalk from "chalk";
import { renderIssue, type Issue } from "../core/analyzer/index.js";
import type { OutputFormat } from "../utils/validation.js";

export const REPORT_TITLE = "Kernel Analyzer";

/**
 * Where reporters write complete lines
 */
export interface ReportSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CheckReporter {
  issue(file: string, issue: Issue): void;
  /** A file that was skipped; the run still fails */
  skipped(file: string, reason: string): void;
  /** A failure that stops the run */
  failure(file: string, message: string): void;
  summary(issueCount: number, fileCount: number): void;
}

export interface ReporterOptions {
  /** Colorize console output (defaults to chalk's terminal detection) */
  color?: boolean;
}

// =============================================================================
// Line Formatting
// =============================================================================

export function formatConsoleIssue(file: string, issue: Issue): string {
  return `${file}:${renderIssue(issue)}`;
}

/**
 * `::error title=Kernel Analyzer,file=<file>,line=<line>::<issue>`
 */
export function formatGithubAnnotation(
  level: "error" | "warning",
  file: string,
  message: string,
  line?: number
): string {
  const properties = [`title=${REPORT_TITLE}`, `file=${file}`];
  if (line !== undefined) properties.push(`line=${line}`);
  return `::${level} ${properties.join(",")}::${message}`;
}

export function formatGithubIssue(file: string, issue: Issue): string {
  return formatGithubAnnotation("error", file, renderIssue(issue), issue.line);
}

// =============================================================================
// Reporters
// =============================================================================

export function createConsoleReporter(
  sink: ReportSink,
  options: ReporterOptions = {}
): CheckReporter {
  const color = options.color ?? chalk.level > 0;
  const paint = (style: (text: string) => string, text: string): string =>
    color ? style(text) : text;

  return {
    issue(file, issue) {
      sink.stderr(paint(chalk.yellow, formatConsoleIssue(file, issue)));
    },
    skipped(file, reason) {
      sink.stderr(paint(chalk.yellow, `${file}: ${reason}`));
    },
    failure(file, message) {
      sink.stderr(paint(chalk.red, `${file}: ${message}`));
    },
    summary(issueCount, fileCount) {
      const files = `${fileCount} file${fileCount === 1 ? "" : "s"}`;
      if (issueCount === 0) {
        sink.stderr(paint(chalk.green, `No issues found in ${files}.`));
      } else {
        const issues = `${issueCount} issue${issueCount === 1 ? "" : "s"}`;
        sink.stderr(paint(chalk.red, `Found ${issues} in ${files}.`));
      }
    },
  };
}

export function createGithubReporter(sink: ReportSink): CheckReporter {
  return {
    issue(file, issue) {
      sink.stdout(formatGithubIssue(file, issue));
    },
    skipped(file, reason) {
      sink.stdout(formatGithubAnnotation("warning", file, reason));
    },
    failure(file, message) {
      sink.stdout(formatGithubAnnotation("error", file, message));
    },
    summary() {
      // annotations only
    },
  };
}

export function createReporter(
  format: OutputFormat,
  sink: ReportSink,
  options: ReporterOptions = {}
): CheckReporter {
  switch (format) {
    case "console":
      return createConsoleReporter(sink, options);
    case "github":
      return createGithubReporter(sink);
  }
}

/**
 * Sink writing to the process streams
 */
export const processSink: ReportSink = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};
