/**
 * Kernel Analyzer Tests
 *
 * End-to-end analysis of Python sources with the real grammar.
 *
 * @module
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createKernelAnalyzer, type KernelAnalyzer } from "../kernel-analyzer.js";
import { renderIssue, type Issue, type IssueKind } from "../issues.js";
import { KernelSchema } from "../../schema/kernel-schema.js";

const FLOAT_1D = "wp.array(dtype=wp.float32, ndim=1)";
const FLOAT_2D = "wp.array(dtype=wp.float32, ndim=2)";

const HEADER = ["import warp as wp", "from simkit.warp_util import kernel", ""];

function source(...lines: string[]): string {
  return [...HEADER, ...lines].join("\n");
}

const NO_ISSUES = source(
  "@kernel",
  "def test_no_issues(",
  "    # Model",
  `    qpos0: ${FLOAT_1D},`,
  "    geom_pos: wp.array(dtype=wp.vec3, ndim=1),",
  "    # Data",
  `    qpos: ${FLOAT_2D},`,
  `    qvel: ${FLOAT_2D},`,
  "    # Data in",
  `    act_in: ${FLOAT_2D},`,
  `    qvel_in: ${FLOAT_2D},`,
  "    # Data out",
  `    act_out: ${FLOAT_2D}`,
  "):",
  "    x = qpos0",
  "    y = act_in",
  "    act_out = 1"
);

describe("KernelAnalyzer", () => {
  let analyzer: KernelAnalyzer;

  beforeAll(async () => {
    analyzer = await createKernelAnalyzer({
      schema: KernelSchema.fromRecords(
        { qpos0: FLOAT_1D, geom_pos: "wp.array(dtype=wp.vec3, ndim=1)" },
        { qpos: FLOAT_2D, qvel: FLOAT_2D, act: FLOAT_2D }
      ),
    });
  });

  afterAll(async () => {
    await analyzer.close();
  });

  const analyze = (code: string): Issue[] => analyzer.analyze(code, "kernels.py");
  const ofKind = (issues: Issue[], kind: IssueKind): Issue[] =>
    issues.filter((issue) => issue.kind === kind);

  // ===========================================================================
  // Clean and Ignored Sources
  // ===========================================================================
  describe("clean sources", () => {
    it("should report nothing for a conforming kernel", () => {
      expect(analyze(NO_ISSUES)).toEqual([]);
    });

    it("should ignore functions that are not kernels", () => {
      const code = source(
        "def test_non_kernel(qpos0: int = 0, *args, **kwargs):",
        "    qpos0 = 1",
        "",
        "@wp.kernel",
        "def attribute_decorated(qpos0, *args):",
        "    qpos0 = 1",
        "",
        "@kernel()",
        "def call_decorated(qpos0, **kwargs):",
        "    qpos0 = 1"
      );
      expect(analyze(code)).toEqual([]);
    });

    it("should return no issues for a syntax error", () => {
      const code = source("@kernel", "def broken(qpos0: int", "    pass");
      expect(analyze(code)).toEqual([]);
    });

    it("should treat a required parameter after a default one as a syntax error", () => {
      const code = source("@kernel", "def k(qpos0: int = 0, qvel: int):", "    pass");
      expect(analyze(code)).toEqual([]);
    });
  });

  // ===========================================================================
  // Signature Shape
  // ===========================================================================
  describe("signature shape", () => {
    it("should report defaults, varargs and kwargs independently", () => {
      const defaults = analyze(source("@kernel", "def k(qpos0: int, qvel: int = 0):", "    pass"));
      expect(ofKind(defaults, "defaults-params")).toHaveLength(1);
      expect(ofKind(defaults, "varargs")).toHaveLength(0);

      const varargs = analyze(source("@kernel", "def k(qpos0: int, *args):", "    pass"));
      expect(ofKind(varargs, "varargs")).toHaveLength(1);
      expect(ofKind(varargs, "kwargs")).toHaveLength(0);

      const kwargs = analyze(source("@kernel", "def k(qpos0: int, **kwargs):", "    pass"));
      expect(ofKind(kwargs, "kwargs")).toHaveLength(1);
      expect(ofKind(kwargs, "defaults-params")).toHaveLength(0);
    });

    it("should count keyword-only defaults", () => {
      const issues = analyze(source("@kernel", "def k(qpos0: int, *, qvel: int = 0):", "    pass"));
      expect(ofKind(issues, "defaults-params")).toEqual([
        { kind: "defaults-params", line: 5, kernel: "k" },
      ]);
    });

    it("should allow required keyword-only parameters after defaults", () => {
      const issues = analyze(source("@kernel", "def k(qpos0: int = 0, *, qvel: int):", "    pass"));
      expect(ofKind(issues, "defaults-params")).toEqual([
        { kind: "defaults-params", line: 5, kernel: "k" },
      ]);
    });
  });

  // ===========================================================================
  // Annotations
  // ===========================================================================
  describe("annotations", () => {
    it("should report an unannotated field once and skip the mismatch check", () => {
      const issues = analyze(source("@kernel", "def k(qpos0):", "    pass"));
      expect(ofKind(issues, "type").map(renderIssue)).toEqual([
        "5: Kernel 'k' param: qpos0 missing type annotation (allowed: int, float, bool, array, array2d, array2df, array3d, array3df)",
      ]);
      expect(ofKind(issues, "type-mismatch")).toEqual([]);
    });

    it("should treat a string annotation as an unexpected type", () => {
      expect(analyze(source("@kernel", 'def k(x: "int"):', "    pass")).map(renderIssue)).toEqual([
        "5: Kernel 'k' param: x has unexpected annotation: 'int' (allowed: int, float, bool, array, array2d, array2df, array3d, array3df)",
      ]);
    });

    it("should report annotations that differ from the schema", () => {
      const issues = analyze(
        source("@kernel", "def k(qpos0: array, geom_pos: array2d):", "    pass")
      );
      expect(ofKind(issues, "type-mismatch").map(renderIssue)).toEqual([
        `5: Kernel 'k' param: qpos0 type mismatch: array (Model field expects ${FLOAT_1D})`,
        "5: Kernel 'k' param: geom_pos type mismatch: array2d (Model field expects wp.array(dtype=wp.vec3, ndim=1))",
      ]);
    });
  });

  // ===========================================================================
  // Positions and Naming
  // ===========================================================================
  describe("positions and naming", () => {
    const argPositions = (params: string) =>
      ofKind(analyze(source("@kernel", `def k(${params}):`, "    pass")), "arg-position").map(renderIssue);

    it("should report a parameter between Model and Data fields", () => {
      expect(argPositions("qpos0: int, custom: int, qpos: int")).toEqual([
        "5: Kernel 'k' param: custom is not a Model or Data field and must not sit between Model/Data params",
      ]);
    });

    it("should report Model fields after Data fields", () => {
      expect(argPositions("qpos: int, qpos0: int")).toEqual([
        "5: Kernel 'k' has Model params after Data params",
      ]);
    });

    it("should report Data sub-ordering", () => {
      expect(argPositions("qvel_in: int, qvel: int")).toEqual([
        "5: Kernel 'k' has Data _in params before regular Data params",
      ]);
      expect(argPositions("qvel_out: int, qvel_in: int")).toEqual([
        "5: Kernel 'k' has Data _out params before Data _in params",
      ]);
    });

    it("should report suffix problems", () => {
      const issues = analyze(source("@kernel", "def k(qpos0_in: int, qvel_invalid: int):", "    pass"));
      expect(ofKind(issues, "model-field-suffix").map(renderIssue)).toEqual([
        "5: Kernel 'k' param: qpos0_in is a Model field and must not have suffix '_in'",
      ]);
      expect(ofKind(issues, "data-field-suffix").map(renderIssue)).toEqual([
        "5: Kernel 'k' param: qvel_invalid looks like Data field 'qvel' but does not end in '_in' or '_out'",
      ]);
    });
  });

  // ===========================================================================
  // Comments and Writes
  // ===========================================================================
  describe("comments and writes", () => {
    it("should report first parameters without marker comments", () => {
      const issues = analyze(source("@kernel", "def k(", "    qpos0: int,", "    qvel: int,", "):", "    pass"));
      expect(ofKind(issues, "missing-comment").map(renderIssue)).toEqual([
        "6: Kernel 'k' param: qpos0 is the first Model param and must be preceded by a '# Model' comment",
        "7: Kernel 'k' param: qvel is the first Data param and must be preceded by a '# Data' comment",
      ]);
    });

    it("should report one write issue per read-only field", () => {
      const issues = analyze(
        source(
          "@kernel",
          "def k(qpos0: int, qvel_in: int, act_out: int):",
          "    qpos0 = 1",
          "    qpos0 += 1",
          "    qvel_in[0] = 2",
          "    qvel_in = 3",
          "    act_out = 4"
        )
      );
      expect(ofKind(issues, "write-to-readonly").map(renderIssue)).toEqual([
        "5: Kernel 'k' writes to read-only Model field: qpos0",
        "5: Kernel 'k' writes to read-only Data input field: qvel_in",
      ]);
    });
  });

  // ===========================================================================
  // Ordering
  // ===========================================================================
  describe("ordering", () => {
    it("should emit issues in rule order within a kernel", () => {
      const issues = analyze(
        source(
          "@kernel",
          "def step(",
          "    qvel: int,",
          "    qpos0: int,",
          "    *args",
          "):",
          "    qpos0 = 1",
          "    qpos0 += 2"
        )
      );
      expect(issues.map(renderIssue)).toEqual([
        "5: Kernel 'step' has varargs",
        `6: Kernel 'step' param: qvel type mismatch: int (Data field expects ${FLOAT_2D})`,
        `7: Kernel 'step' param: qpos0 type mismatch: int (Model field expects ${FLOAT_1D})`,
        "5: Kernel 'step' has Model params after Data params",
        "6: Kernel 'step' param: qvel is the first Data param and must be preceded by a '# Data' comment",
        "7: Kernel 'step' param: qpos0 is the first Model param and must be preceded by a '# Model' comment",
        "5: Kernel 'step' writes to read-only Model field: qpos0",
      ]);
    });

    it("should visit kernels top to bottom, nested ones included", () => {
      const issues = analyze(
        source(
          "def outer():",
          "    @kernel",
          "    def inner(x: str):",
          "        pass",
          "",
          "@kernel",
          "def last(y: str):",
          "    pass"
        )
      );
      expect(issues.map(renderIssue)).toEqual([
        "6: Kernel 'inner' param: x has unexpected annotation: str (allowed: int, float, bool, array, array2d, array2df, array3d, array3df)",
        "10: Kernel 'last' param: y has unexpected annotation: str (allowed: int, float, bool, array, array2d, array2df, array3d, array3df)",
      ]);
    });
  });
});
