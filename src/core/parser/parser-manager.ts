/**
 * Parser Manager
 *
 * Manages the Tree-sitter parser for Python sources. The grammar is loaded
 * once; parsing afterwards is synchronous.
 *
 * @module
 */

import { Parser, Language, type Tree, type Node } from "web-tree-sitter";
import * as fs from "node:fs";
import * as path from "node:path";
import { createRequire } from "node:module";
import { ErrorCode, ParsingError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export interface ParserManagerOptions {
  /** Explicit path to the Python grammar WASM file */
  wasmPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

const GRAMMAR_MODULE = "tree-sitter-python";
const GRAMMAR_WASM_FILE = "tree-sitter-python.wasm";
const WASM_PATH_ENV = "KERNEL_ANALYZER_PYTHON_WASM";

// =============================================================================
// Parser Manager Class
// =============================================================================

/**
 * Manages the Tree-sitter parser for Python.
 *
 * @example
 * ```typescript
 * const manager = new ParserManager();
 * await manager.initialize();
 *
 * const tree = manager.parse("def f(x: int):\n    pass\n");
 * console.log(tree.rootNode.type); // "module"
 * tree.delete();
 *
 * await manager.close();
 * ```
 */
export class ParserManager {
  private parser: Parser | null = null;
  private readonly options: ParserManagerOptions;

  constructor(options: ParserManagerOptions = {}) {
    this.options = options;
  }

  /**
   * Initializes Tree-sitter and loads the Python grammar.
   */
  async initialize(): Promise<void> {
    if (this.parser) {
      return;
    }

    await Parser.init();

    const wasmPath = this.resolveWasmPath();
    if (!fs.existsSync(wasmPath)) {
      throw new ParsingError(
        `Python grammar not found at ${wasmPath}`,
        ErrorCode.PARSE_GRAMMAR_NOT_FOUND,
        { filePath: wasmPath }
      );
    }

    const language = await Language.load(wasmPath);
    const parser = new Parser();
    parser.setLanguage(language);
    this.parser = parser;
  }

  /**
   * Releases the parser.
   */
  async close(): Promise<void> {
    this.parser?.delete();
    this.parser = null;
  }

  /**
   * Parses Python source code. The caller owns the returned tree and must
   * `delete()` it.
   *
   * @throws ParsingError with code PARSE_SYNTAX_ERROR when the tree contains
   *   error or missing nodes
   */
  parse(code: string, filePath = "<string>"): Tree {
    const parser = this.getParser();
    const tree = parser.parse(code);

    if (!tree) {
      throw new ParsingError(`Failed to parse ${filePath}`, ErrorCode.PARSE_FAILED, {
        filePath,
      });
    }

    if (tree.rootNode.hasError) {
      const errorNode = findFirstError(tree.rootNode);
      const line = (errorNode?.startPosition.row ?? 0) + 1;
      const column = (errorNode?.startPosition.column ?? 0) + 1;
      const message = errorNode?.isMissing
        ? `missing ${errorNode.type}`
        : "invalid syntax";
      tree.delete();
      throw new ParsingError(message, ErrorCode.PARSE_SYNTAX_ERROR, {
        filePath,
        line,
        column,
      });
    }

    return tree;
  }

  /**
   * Resolves the WASM file shipped with the grammar package.
   */
  private resolveWasmPath(): string {
    const explicit = this.options.wasmPath ?? process.env[WASM_PATH_ENV];
    if (explicit) {
      return path.resolve(explicit);
    }

    // The grammar's entry point lives in bindings/node; the WASM file sits at
    // the package root, next to package.json.
    const require = createRequire(import.meta.url);
    let dir = path.dirname(require.resolve(GRAMMAR_MODULE));
    while (!fs.existsSync(path.join(dir, "package.json"))) {
      const parent = path.dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }
    return path.join(dir, GRAMMAR_WASM_FILE);
  }

  private getParser(): Parser {
    if (!this.parser) {
      throw new ParsingError(
        "ParserManager not initialized. Call initialize() first.",
        ErrorCode.PARSE_NOT_INITIALIZED
      );
    }
    return this.parser;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Depth-first search for the first ERROR or MISSING node.
 */
function findFirstError(node: Node): Node | null {
  if (node.type === "ERROR" || node.isMissing) {
    return node;
  }
  for (const child of node.children) {
    if (child && (child.hasError || child.isMissing)) {
      const found = findFirstError(child);
      if (found) return found;
    }
  }
  return null;
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Creates and initializes a ParserManager.
 */
export async function createParserManager(
  options: ParserManagerOptions = {}
): Promise<ParserManager> {
  const manager = new ParserManager(options);
  await manager.initialize();
  return manager;
}
