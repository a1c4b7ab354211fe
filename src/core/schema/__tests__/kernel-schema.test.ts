import { describe, it, expect } from "vitest";
import { KernelSchema, splitDataSuffix } from "../kernel-schema.js";
import { SchemaError } from "../../errors.js";

const FLOAT_1D = "wp.array(dtype=wp.float32, ndim=1)";
const FLOAT_2D = "wp.array(dtype=wp.float32, ndim=2)";

function testSchema(): KernelSchema {
  return KernelSchema.fromRecords(
    { qpos0: FLOAT_1D, geom_pos: "wp.array(dtype=wp.vec3, ndim=1)" },
    { qpos: FLOAT_2D, qvel: FLOAT_2D, act: FLOAT_2D }
  );
}

describe("splitDataSuffix", () => {
  it("should split _in and _out", () => {
    expect(splitDataSuffix("qvel_in")).toEqual({ base: "qvel", suffix: "_in" });
    expect(splitDataSuffix("qvel_out")).toEqual({ base: "qvel", suffix: "_out" });
  });

  it("should return null without a suffix or without a base", () => {
    expect(splitDataSuffix("qvel")).toBeNull();
    expect(splitDataSuffix("qvel_inner")).toBeNull();
    expect(splitDataSuffix("_in")).toBeNull();
  });
});

describe("KernelSchema", () => {
  it("should expose canonical fields", () => {
    const schema = testSchema();
    expect([...schema.modelFields().keys()]).toEqual(["qpos0", "geom_pos"]);
    expect([...schema.dataFields().keys()]).toEqual(["qpos", "qvel", "act"]);
  });

  it("should expand Data fields with _in and _out variants", () => {
    const expanded = testSchema().expandedDataFields();
    expect(expanded.size).toBe(9);
    expect(expanded.get("act_in")).toBe(FLOAT_2D);
    expect(expanded.get("act_out")).toBe(FLOAT_2D);
    expect(expanded.get("qpos")).toBe(FLOAT_2D);
  });

  it("should look up fields directly and through a suffix", () => {
    const schema = testSchema();
    expect(schema.lookupField("qpos0")).toEqual({ family: "Model", name: "qpos0", type: FLOAT_1D });
    expect(schema.lookupField("qpos0_in")).toEqual({ family: "Model", name: "qpos0", type: FLOAT_1D });
    expect(schema.lookupField("qvel_out")).toEqual({ family: "Data", name: "qvel", type: FLOAT_2D });
    expect(schema.lookupField("custom")).toBeNull();
  });

  it("should reject canonical names with a data suffix", () => {
    expect(() => KernelSchema.fromRecords({ qpos0: "int" }, { qvel_in: "int" })).toThrow(SchemaError);
  });

  it("should reject an empty entity", () => {
    expect(() => KernelSchema.fromRecords({}, { qvel: "int" })).toThrow("Model has no fields");
  });
});
