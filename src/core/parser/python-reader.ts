/**
 * Python Syntax Reader
 *
 * Reads a Tree-sitter Python tree into the syntax model the kernel rules and
 * the schema loader work on.
 *
 * @module
 */

import type { Tree, Node } from "web-tree-sitter";
import type {
  PyAnnotatedField,
  PyClassDef,
  PyExpr,
  PyFunctionDef,
  PyKeyword,
  PyModule,
  PyParameter,
  PyWrite,
} from "../../types/python.js";
import { ErrorCode, ParsingError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

type SyntaxNode = Node;

/**
 * Mutable parameter-list state while walking a `parameters` node.
 */
interface ParameterListState {
  params: PyParameter[];
  vararg: string | null;
  kwarg: string | null;
  keywordOnly: boolean;
}

const PATTERN_TYPES = new Set(["pattern_list", "tuple_pattern", "list_pattern"]);

// =============================================================================
// Node Helpers
// =============================================================================

/**
 * Named children without comments. Comments are extras and may show up
 * anywhere, including inside parameter lists.
 */
export function namedChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter(
    (child): child is SyntaxNode => child !== null && child.type !== "comment"
  );
}

function firstNamedChild(node: SyntaxNode): SyntaxNode | null {
  return namedChildren(node)[0] ?? null;
}

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * Python rejects a positional parameter without a default after one with a
 * default; the grammar accepts it. Keyword-only parameters are exempt.
 *
 * @throws ParsingError with code PARSE_SYNTAX_ERROR
 */
function checkDefaultOrder(params: readonly PyParameter[]): void {
  let seenDefault = false;
  for (const param of params) {
    if (param.keywordOnly) break;
    if (param.hasDefault) {
      seenDefault = true;
    } else if (seenDefault) {
      throw new ParsingError(
        "parameter without a default follows parameter with a default",
        ErrorCode.PARSE_SYNTAX_ERROR,
        { line: param.line }
      );
    }
  }
}

// =============================================================================
// Python Reader Class
// =============================================================================

/**
 * Reads Python syntax trees into the kernel syntax model.
 *
 * @example
 * ```typescript
 * const reader = new PythonReader();
 * const module = reader.read(tree);
 * for (const fn of module.functions) {
 *   console.log(fn.name, fn.params.map((p) => p.name));
 * }
 * ```
 */
export class PythonReader {
  /**
   * Reads every function and class definition in the tree.
   */
  read(tree: Tree): PyModule {
    const functions: PyFunctionDef[] = [];
    const classes: PyClassDef[] = [];

    const walk = (node: SyntaxNode): void => {
      if (node.type === "function_definition") {
        functions.push(this.readFunction(node));
      } else if (node.type === "class_definition") {
        classes.push(this.readClass(node));
      }
      for (const child of namedChildren(node)) {
        walk(child);
      }
    };

    walk(tree.rootNode);
    return { functions, classes };
  }

  // ===========================================================================
  // Functions
  // ===========================================================================

  /**
   * Reads a `function_definition` node.
   */
  readFunction(node: SyntaxNode): PyFunctionDef {
    const state: ParameterListState = {
      params: [],
      vararg: null,
      kwarg: null,
      keywordOnly: false,
    };

    const paramsNode = node.childForFieldName("parameters");
    if (paramsNode) {
      for (const child of namedChildren(paramsNode)) {
        this.readParameter(child, state);
      }
      checkDefaultOrder(state.params);
    }

    const bodyNode = node.childForFieldName("body");

    return {
      name: node.childForFieldName("name")?.text ?? "",
      line: lineOf(node),
      decorators: this.readDecorators(node),
      params: state.params,
      vararg: state.vararg,
      kwarg: state.kwarg,
      writes: bodyNode ? this.readWrites(bodyNode) : [],
    };
  }

  /**
   * Decorators live on the enclosing `decorated_definition`, not on the
   * function node itself.
   */
  private readDecorators(node: SyntaxNode): PyExpr[] {
    const parent = node.parent;
    if (!parent || parent.type !== "decorated_definition") {
      return [];
    }

    const decorators: PyExpr[] = [];
    for (const child of namedChildren(parent)) {
      if (child.type !== "decorator") continue;
      const expression = firstNamedChild(child);
      if (expression) {
        decorators.push(this.readExpression(expression));
      }
    }
    return decorators;
  }

  private readParameter(node: SyntaxNode, state: ParameterListState): void {
    const push = (name: string, annotation: PyExpr | null, hasDefault: boolean): void => {
      state.params.push({
        name,
        annotation,
        hasDefault,
        keywordOnly: state.keywordOnly,
        line: lineOf(node),
      });
    };

    switch (node.type) {
      case "identifier":
        push(node.text, null, false);
        break;

      case "typed_parameter": {
        const inner = firstNamedChild(node);
        if (inner?.type === "list_splat_pattern") {
          state.vararg = this.splatName(inner);
          state.keywordOnly = true;
        } else if (inner?.type === "dictionary_splat_pattern") {
          state.kwarg = this.splatName(inner);
        } else if (inner) {
          push(inner.text, this.readAnnotation(node.childForFieldName("type")), false);
        }
        break;
      }

      case "default_parameter":
        push(node.childForFieldName("name")?.text ?? "", null, true);
        break;

      case "typed_default_parameter":
        push(
          node.childForFieldName("name")?.text ?? "",
          this.readAnnotation(node.childForFieldName("type")),
          true
        );
        break;

      case "list_splat_pattern":
        state.vararg = this.splatName(node);
        state.keywordOnly = true;
        break;

      case "dictionary_splat_pattern":
        state.kwarg = this.splatName(node);
        break;

      case "keyword_separator":
        state.keywordOnly = true;
        break;

      default:
        // positional_separator, tuple_pattern
        break;
    }
  }

  private splatName(node: SyntaxNode): string {
    return firstNamedChild(node)?.text ?? node.text.replace(/^\*+/, "");
  }

  // ===========================================================================
  // Body Writes
  // ===========================================================================

  /**
   * Collects stores in a body. Nested blocks and nested functions are
   * included; assignment chains (`a = b = 0`) yield one write per target.
   */
  private readWrites(bodyNode: SyntaxNode): PyWrite[] {
    const writes: PyWrite[] = [];

    const walk = (node: SyntaxNode): void => {
      if (node.type === "assignment") {
        // `x: int` alone declares, it does not store
        if (node.childForFieldName("right")) {
          this.collectTargets(node.childForFieldName("left"), writes);
        }
      } else if (node.type === "augmented_assignment") {
        this.collectTargets(node.childForFieldName("left"), writes);
      }
      for (const child of namedChildren(node)) {
        walk(child);
      }
    };

    walk(bodyNode);
    return writes;
  }

  /**
   * Bare names are writes only as a whole target; inside an unpacking
   * pattern only subscripts count.
   */
  private collectTargets(
    target: SyntaxNode | null,
    writes: PyWrite[],
    nested = false
  ): void {
    if (!target) return;

    if ((target.type === "identifier" && !nested) || target.type === "subscript") {
      writes.push({ target: this.readExpression(target) });
    } else if (PATTERN_TYPES.has(target.type)) {
      for (const element of namedChildren(target)) {
        this.collectTargets(element, writes, true);
      }
    }
  }

  // ===========================================================================
  // Classes
  // ===========================================================================

  /**
   * Reads a `class_definition` node and its annotated attributes.
   */
  readClass(node: SyntaxNode): PyClassDef {
    const fields: PyAnnotatedField[] = [];
    const bodyNode = node.childForFieldName("body");

    if (bodyNode) {
      for (const statement of namedChildren(bodyNode)) {
        if (statement.type !== "expression_statement") continue;
        const assignment = firstNamedChild(statement);
        if (assignment?.type !== "assignment") continue;

        const left = assignment.childForFieldName("left");
        const annotation = this.readAnnotation(assignment.childForFieldName("type"));
        if (left?.type === "identifier" && annotation) {
          fields.push({ name: left.text, annotation, line: lineOf(assignment) });
        }
      }
    }

    return {
      name: node.childForFieldName("name")?.text ?? "",
      line: lineOf(node),
      fields,
    };
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  /**
   * Reads an annotation. Tree-sitter wraps annotations in a `type` node.
   */
  readAnnotation(node: SyntaxNode | null): PyExpr | null {
    if (!node) return null;
    return this.readExpression(node);
  }

  /**
   * Reads an expression node into the reduced expression model.
   */
  readExpression(node: SyntaxNode): PyExpr {
    switch (node.type) {
      case "identifier":
      case "keyword_identifier":
        return { kind: "name", id: node.text };

      case "attribute": {
        const object = node.childForFieldName("object");
        const attribute = node.childForFieldName("attribute");
        if (!object || !attribute) break;
        return { kind: "attribute", value: this.readExpression(object), attr: attribute.text };
      }

      // `a.b` read as a type rather than an expression
      case "member_type": {
        const parts = namedChildren(node);
        const object = parts[0];
        const attribute = parts[parts.length - 1];
        if (!object || !attribute || parts.length < 2) break;
        return { kind: "attribute", value: this.readExpression(object), attr: attribute.text };
      }

      case "type":
      case "parenthesized_expression": {
        const inner = firstNamedChild(node);
        if (!inner) break;
        return this.readExpression(inner);
      }

      case "call":
        return this.readCall(node);

      case "subscript": {
        const value = node.childForFieldName("value");
        if (!value) break;
        return { kind: "subscript", value: this.readExpression(value) };
      }

      case "integer":
      case "float":
        return { kind: "constant", literal: "number", value: node.text };

      case "true":
        return { kind: "constant", literal: "keyword", value: "True" };
      case "false":
        return { kind: "constant", literal: "keyword", value: "False" };
      case "none":
        return { kind: "constant", literal: "keyword", value: "None" };

      case "string":
        return { kind: "constant", literal: "string", value: this.stringValue(node) };
      case "concatenated_string":
        return {
          kind: "constant",
          literal: "string",
          value: namedChildren(node).map((part) => this.stringValue(part)).join(""),
        };

      default:
        break;
    }

    return { kind: "other", nodeType: node.type, text: node.text };
  }

  private readCall(node: SyntaxNode): PyExpr {
    const funcNode = node.childForFieldName("function");
    const argsNode = node.childForFieldName("arguments");
    if (!funcNode) {
      return { kind: "other", nodeType: node.type, text: node.text };
    }

    const args: PyExpr[] = [];
    const keywords: PyKeyword[] = [];

    if (argsNode?.type === "argument_list") {
      for (const arg of namedChildren(argsNode)) {
        if (arg.type === "keyword_argument") {
          const name = arg.childForFieldName("name");
          const value = arg.childForFieldName("value");
          if (name && value) {
            keywords.push({ arg: name.text, value: this.readExpression(value) });
          }
        } else if (arg.type === "dictionary_splat") {
          const value = firstNamedChild(arg);
          if (value) {
            keywords.push({ arg: null, value: this.readExpression(value) });
          }
        } else {
          args.push(this.readExpression(arg));
        }
      }
    } else if (argsNode) {
      // generator expression argument: f(x for x in y)
      args.push(this.readExpression(argsNode));
    }

    return { kind: "call", func: this.readExpression(funcNode), args, keywords };
  }

  /**
   * Content of a string literal, without prefix and quotes.
   */
  private stringValue(node: SyntaxNode): string {
    return namedChildren(node)
      .filter((part) => part.type === "string_content")
      .map((part) => part.text)
      .join("");
  }
}
