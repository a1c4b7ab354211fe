import { describe, it, expect } from "vitest";
import {
  createReporter,
  formatConsoleIssue,
  formatGithubAnnotation,
  formatGithubIssue,
  type ReportSink,
} from "../reporters.js";
import type { Issue } from "../../core/analyzer/index.js";

const issue: Issue = { kind: "varargs", line: 7, kernel: "step" };

function recordingSink(): ReportSink & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => {
      out.push(line);
    },
    stderr: (line) => {
      err.push(line);
    },
  };
}

describe("line formatting", () => {
  it("should prefix console issues with the file", () => {
    expect(formatConsoleIssue("kernels/smooth.py", issue)).toBe(
      "kernels/smooth.py:7: Kernel 'step' has varargs"
    );
  });

  it("should format GitHub workflow commands", () => {
    expect(formatGithubIssue("kernels/smooth.py", issue)).toBe(
      "::error title=Kernel Analyzer,file=kernels/smooth.py,line=7::7: Kernel 'step' has varargs"
    );
    expect(formatGithubAnnotation("warning", "notes.txt", "Skipping non-Python file")).toBe(
      "::warning title=Kernel Analyzer,file=notes.txt::Skipping non-Python file"
    );
  });
});

describe("reporters", () => {
  it("should write console reports to stderr", () => {
    const sink = recordingSink();
    const reporter = createReporter("console", sink, { color: false });
    reporter.issue("a.py", issue);
    reporter.skipped("notes.txt", "Skipping non-Python file");
    reporter.summary(1, 2);
    expect(sink.out).toEqual([]);
    expect(sink.err).toEqual([
      "a.py:7: Kernel 'step' has varargs",
      "notes.txt: Skipping non-Python file",
      "Found 1 issue in 2 files.",
    ]);
  });

  it("should write GitHub reports to stdout without a summary", () => {
    const sink = recordingSink();
    const reporter = createReporter("github", sink);
    reporter.issue("a.py", issue);
    reporter.failure("b.py", "Error processing file: boom");
    reporter.summary(1, 2);
    expect(sink.err).toEqual([]);
    expect(sink.out).toEqual([
      "::error title=Kernel Analyzer,file=a.py,line=7::7: Kernel 'step' has varargs",
      "::error title=Kernel Analyzer,file=b.py::Error processing file: boom",
    ]);
  });
});
