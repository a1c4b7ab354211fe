import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { DiagnosticSeverity } from "vscode-languageserver/node.js";
import { toDiagnostic, toDiagnostics, DIAGNOSTIC_SOURCE } from "../diagnostics.js";
import { diagnoseDocument } from "../server.js";
import { createKernelAnalyzer, type KernelAnalyzer } from "../../core/analyzer/index.js";
import { KernelSchema } from "../../core/schema/kernel-schema.js";

describe("toDiagnostic", () => {
  it("should cover the issue's line as a warning", () => {
    expect(toDiagnostic({ kind: "varargs", line: 5, kernel: "step" })).toEqual({
      range: {
        start: { line: 4, character: 0 },
        end: { line: 5, character: 0 },
      },
      message: "5: Kernel 'step' has varargs",
      severity: DiagnosticSeverity.Warning,
      code: "KA0008",
      source: DIAGNOSTIC_SOURCE,
    });
  });

  it("should keep issue order", () => {
    const diagnostics = toDiagnostics([
      { kind: "kwargs", line: 3, kernel: "a" },
      { kind: "defaults-params", line: 1, kernel: "b" },
    ]);
    expect(diagnostics.map((d) => d.code)).toEqual(["KA0003", "KA0002"]);
  });
});

describe("diagnoseDocument", () => {
  let analyzer: KernelAnalyzer;

  beforeAll(async () => {
    analyzer = await createKernelAnalyzer({
      schema: KernelSchema.fromRecords({ qpos0: "int" }, { qvel: "int" }),
    });
  });

  afterAll(async () => {
    await analyzer.close();
  });

  it("should analyze the full document text", () => {
    const text = ["@kernel", "def k(", "    # Model", "    qpos0: int,", "    **kwargs", "):", "    pass"].join("\n");
    const diagnostics = diagnoseDocument(analyzer, "file:///work/kernels.py", text);
    expect(diagnostics.map((d) => d.message)).toEqual(["2: Kernel 'k' has kwargs"]);
  });

  it("should publish an empty set for unparsable documents", () => {
    expect(diagnoseDocument(analyzer, "file:///work/broken.py", "def broken(:\n")).toEqual([]);
  });
});
