/**
 * Kernel Analyzer
 *
 * Parses a Python source, finds its kernels and runs every rule on each of
 * them. Malformed input never throws out of `analyze`: syntax errors and
 * internal failures are logged and the issues gathered so far are returned.
 *
 * @module
 */

import type { Tree } from "web-tree-sitter";
import { ErrorCode, ParsingError } from "../errors.js";
import { createParserManager, type ParserManager } from "../parser/parser-manager.js";
import { PythonReader } from "../parser/python-reader.js";
import type { KernelSchema } from "../schema/kernel-schema.js";
import { loadSchema } from "../schema/schema-loader.js";
import type { PyFunctionDef } from "../../types/python.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { classifyParameters } from "./classification.js";
import type { Issue } from "./issues.js";
import { isKernel } from "./kernel-detection.js";
import { DEFAULT_RULES, type KernelRule, type RuleContext } from "./rules/index.js";

// =============================================================================
// Types
// =============================================================================

export interface KernelAnalyzerOptions {
  /** Schema object, or the path of a schema file to load */
  schema: KernelSchema | string;
  /** Explicit path to the Python grammar WASM file */
  wasmPath?: string;
  /** Model class name when the schema is a Python module */
  modelClass?: string;
  /** Data class name when the schema is a Python module */
  dataClass?: string;
  logger?: Logger;
}

// =============================================================================
// Kernel Analyzer Class
// =============================================================================

/**
 * Runs the kernel rules over Python sources.
 *
 * @example
 * ```typescript
 * const analyzer = await createKernelAnalyzer({ schema: "kernel-schema.json" });
 * for (const issue of analyzer.analyze(source, "smooth.py")) {
 *   console.log(renderIssue(issue));
 * }
 * await analyzer.close();
 * ```
 */
export class KernelAnalyzer {
  private readonly reader = new PythonReader();
  private readonly rules: readonly KernelRule[] = DEFAULT_RULES;

  constructor(
    private readonly parser: ParserManager,
    readonly schema: KernelSchema,
    private readonly logger: Logger = createLogger("analyzer")
  ) {}

  /**
   * Analyzes one source text. Issues come in tree order of the kernels and,
   * within a kernel, in rule order.
   */
  analyze(sourceText: string, filename = "<string>"): Issue[] {
    const issues: Issue[] = [];
    this.logger.info({ filename }, "Analyzing file");

    let tree: Tree | null = null;
    try {
      tree = this.parser.parse(sourceText, filename);
      const { functions } = this.reader.read(tree);
      const sourceLines = sourceText.split(/\r?\n/);

      for (const fn of functions) {
        if (!isKernel(fn)) continue;
        issues.push(...this.checkKernel(fn, sourceLines));
      }
    } catch (error) {
      if (error instanceof ParsingError && error.code === ErrorCode.PARSE_SYNTAX_ERROR) {
        this.logger.error(
          { filename, line: error.line, column: error.column },
          `Syntax error in ${filename}:${error.line ?? "?"}: ${error.message}`
        );
      } else {
        this.logger.error({ err: error, filename }, `Error analyzing ${filename}`);
      }
    } finally {
      tree?.delete();
    }

    this.logger.info(
      { filename, issues: issues.length },
      `Finished analyzing ${filename}. Found ${issues.length} issues.`
    );
    return issues;
  }

  /**
   * Runs every rule on one kernel.
   */
  checkKernel(fn: PyFunctionDef, sourceLines: readonly string[]): Issue[] {
    const context: RuleContext = {
      fn,
      params: classifyParameters(fn.params, this.schema),
      schema: this.schema,
      sourceLines,
    };
    return this.rules.flatMap((rule) => rule.check(context));
  }

  /**
   * Releases the parser.
   */
  async close(): Promise<void> {
    await this.parser.close();
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Loads the grammar (and the schema, when given a path) and creates an
 * analyzer.
 */
export async function createKernelAnalyzer(
  options: KernelAnalyzerOptions
): Promise<KernelAnalyzer> {
  const parser = await createParserManager({ wasmPath: options.wasmPath });

  try {
    const schema =
      typeof options.schema === "string"
        ? await loadSchema(options.schema, {
          parser,
          modelClass: options.modelClass,
          dataClass: options.dataClass,
        })
        : options.schema;
    return new KernelAnalyzer(parser, schema, options.logger);
  } catch (error) {
    await parser.close();
    throw error;
  }
}
