import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ParserManager } from "../../parser/parser-manager.js";
import { loadSchema, schemaFromJson, schemaFromPython } from "../schema-loader.js";
import { ErrorCode, SchemaError } from "../../errors.js";

const TYPES_MODULE = [
  "import dataclasses",
  "import warp as wp",
  "",
  "@dataclasses.dataclass",
  "class Model:",
  '  """Static model fields."""',
  "  nq: int",
  "  qpos0: wp.array(dtype=float)",
  "",
  "class Data:",
  "  qpos: wp.array2d(dtype=float)",
  "  qvel: wp.array2d(dtype=float)",
  "  time: float = 0.0",
].join("\n");

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

describe("Schema Loader", () => {
  let parserManager: ParserManager;
  let tmpDir: string;

  beforeAll(async () => {
    parserManager = new ParserManager();
    await parserManager.initialize();
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "kernel-schema-"));
  });

  afterAll(async () => {
    await parserManager.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("schemaFromJson", () => {
    it("should build a schema from field maps", () => {
      const schema = schemaFromJson({ model: { nq: "int" }, data: { qpos: "wp.array2d(dtype=float)" } });
      expect(schema.modelFields().get("nq")).toBe("int");
      expect(schema.dataFields().get("qpos")).toBe("wp.array2d(dtype=float)");
    });

    it("should reject documents of the wrong shape", () => {
      expect(() => schemaFromJson({ model: { nq: "int" } })).toThrow(SchemaError);
      expect(() => schemaFromJson({ model: {}, data: { qpos: "int" } })).toThrow(
        "model: must declare at least one field"
      );
    });
  });

  describe("schemaFromPython", () => {
    it("should read the annotated attributes of Model and Data", () => {
      const schema = schemaFromPython(parserManager, TYPES_MODULE);
      expect([...schema.modelFields()]).toEqual([
        ["nq", "int"],
        ["qpos0", "wp.array(dtype=float)"],
      ]);
      expect([...schema.dataFields()]).toEqual([
        ["qpos", "wp.array2d(dtype=float)"],
        ["qvel", "wp.array2d(dtype=float)"],
        ["time", "float"],
      ]);
    });

    it("should honour custom class names", () => {
      const source = "class M:\n  a: int\n\nclass D:\n  b: float\n";
      const schema = schemaFromPython(parserManager, source, "types.py", {
        modelClass: "M",
        dataClass: "D",
      });
      expect(schema.isModelField("a")).toBe(true);
      expect(schema.isDataField("b")).toBe(true);
    });

    it("should fail when a class is missing", () => {
      expect(() => schemaFromPython(parserManager, "class Model:\n  a: int\n", "types.py")).toThrow(
        "Class 'Data' not found in types.py"
      );
    });

    it("should fail on a syntax error", () => {
      expect(() => schemaFromPython(parserManager, "class Model(:\n")).toThrow(SchemaError);
    });
  });

  describe("loadSchema", () => {
    it("should load a JSON schema file", async () => {
      const file = path.join(tmpDir, "schema.json");
      await fs.writeFile(file, JSON.stringify({ model: { qpos0: "int" }, data: { qvel: "float" } }));
      const schema = await loadSchema(file);
      expect(schema.lookupField("qvel_in")).toEqual({ family: "Data", name: "qvel", type: "float" });
    });

    it("should load a Python types module", async () => {
      const file = path.join(tmpDir, "types.py");
      await fs.writeFile(file, TYPES_MODULE);
      const schema = await loadSchema(file, { parser: parserManager });
      expect(schema.modelFields().get("qpos0")).toBe("wp.array(dtype=float)");
    });

    it("should report unreadable files", async () => {
      const error = await rejection(loadSchema(path.join(tmpDir, "missing.json")));
      expect(error).toBeInstanceOf(SchemaError);
      expect(error).toMatchObject({ code: ErrorCode.SCHEMA_UNREADABLE });
    });

    it("should report malformed JSON", async () => {
      const file = path.join(tmpDir, "broken.json");
      await fs.writeFile(file, "{ model");
      const error = await rejection(loadSchema(file));
      expect(error).toMatchObject({ code: ErrorCode.SCHEMA_INVALID });
    });

    it("should reject unsupported file types", async () => {
      const file = path.join(tmpDir, "schema.txt");
      await fs.writeFile(file, "model");
      const error = await rejection(loadSchema(file));
      expect(error).toMatchObject({ code: ErrorCode.SCHEMA_INVALID });
      expect(error).toHaveProperty("message", "Unsupported schema file type: .txt");
    });

    it("should require a parser for Python schemas", async () => {
      const file = path.join(tmpDir, "types-no-parser.py");
      await fs.writeFile(file, TYPES_MODULE);
      await expect(loadSchema(file)).rejects.toThrow("A parser is required to load a Python schema");
    });
  });
});
