/**
 * Issue to Diagnostic Conversion
 *
 * @module
 */

import { DiagnosticSeverity, type Diagnostic } from "vscode-languageserver/node.js";
import { issueCode, renderIssue, type Issue } from "../core/analyzer/index.js";

export const DIAGNOSTIC_SOURCE = "Kernel Analyzer";

/**
 * Converts an issue to a warning covering its whole (0-based) line.
 */
export function toDiagnostic(issue: Issue): Diagnostic {
  return {
    range: {
      start: { line: issue.line - 1, character: 0 },
      end: { line: issue.line, character: 0 },
    },
    message: renderIssue(issue),
    severity: DiagnosticSeverity.Warning,
    code: issueCode(issue),
    source: DIAGNOSTIC_SOURCE,
  };
}

export function toDiagnostics(issues: readonly Issue[]): Diagnostic[] {
  return issues.map(toDiagnostic);
}
