/**
 * Python syntax trees via web-tree-sitter.
 *
 * The runtime WASM ships with web-tree-sitter and the grammar WASM ships with
 * the tree-sitter-python package; both are located on disk and loaded once.
 */

import { existsSync } from "fs";
import { createRequire } from "module";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

import { Parser, Language } from "web-tree-sitter";
import type { Node, Tree } from "web-tree-sitter";

import { ParseError, ParserUnavailableError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err } from "../../lib/result.js";
import type { Result } from "../../lib/result.js";

export type { Node as SyntaxNode, Tree as SyntaxTree } from "web-tree-sitter";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

const log = logger.child("[syntax]");

let parserPromise: Promise<Result<Parser, ParserUnavailableError>> | undefined;

/**
 * Directory of an installed package, found through its main entry
 */
function packageDir(name: string, mainDepth: number): string | undefined {
  try {
    let dir = dirname(require.resolve(name));
    for (let i = 0; i < mainDepth; i++) {
      dir = dirname(dir);
    }
    return dir;
  } catch {
    return undefined;
  }
}

function firstExisting(candidates: Array<string | undefined>): string | undefined {
  return candidates.find((candidate): candidate is string =>
    candidate !== undefined && existsSync(candidate)
  );
}

function runtimeWasmPath(): string | undefined {
  const fromPackage = packageDir("web-tree-sitter", 0);
  return firstExisting([
    fromPackage && join(fromPackage, "tree-sitter.wasm"),
    join(process.cwd(), "node_modules/web-tree-sitter/tree-sitter.wasm"),
    join(__dirname, "../../../node_modules/web-tree-sitter/tree-sitter.wasm"),
  ]);
}

function grammarWasmPath(): string | undefined {
  // main is bindings/node/index.js
  const fromPackage = packageDir("tree-sitter-python", 2);
  return firstExisting([
    fromPackage && join(fromPackage, "tree-sitter-python.wasm"),
    join(process.cwd(), "node_modules/tree-sitter-python/tree-sitter-python.wasm"),
    join(__dirname, "../../../node_modules/tree-sitter-python/tree-sitter-python.wasm"),
  ]);
}

async function createParser(): Promise<Result<Parser, ParserUnavailableError>> {
  const runtimePath = runtimeWasmPath();
  if (runtimePath === undefined) {
    return err(new ParserUnavailableError("tree-sitter.wasm not found; is web-tree-sitter installed?", "tree-sitter.wasm"));
  }
  const grammarPath = grammarWasmPath();
  if (grammarPath === undefined) {
    return err(
      new ParserUnavailableError("tree-sitter-python.wasm not found; is tree-sitter-python installed?", "tree-sitter-python.wasm")
    );
  }

  try {
    await Parser.init({ locateFile: () => runtimePath });
    const python = await Language.load(grammarPath);
    const parser = new Parser();
    parser.setLanguage(python);
    log.debug(`loaded Python grammar from ${grammarPath}`);
    return ok(parser);
  } catch (error) {
    return err(
      new ParserUnavailableError(
        `Failed to initialize tree-sitter: ${error instanceof Error ? error.message : String(error)}`,
        grammarPath
      )
    );
  }
}

/**
 * Shared parser instance. A failed initialisation is not cached.
 */
export async function getPythonParser(): Promise<Result<Parser, ParserUnavailableError>> {
  if (parserPromise === undefined) {
    parserPromise = createParser();
  }
  const result = await parserPromise;
  if (!result.success) {
    parserPromise = undefined;
  }
  return result;
}

/**
 * Parse Python source. Syntax errors are an error result, not a partial tree.
 *
 * @throws {ParserUnavailableError} when the runtime or grammar cannot be loaded
 */
export async function parsePython(source: string): Promise<Result<Tree, ParseError>> {
  const parserResult = await getPythonParser();
  if (!parserResult.success) {
    throw parserResult.error;
  }

  const tree = parserResult.data.parse(source);
  if (!tree) {
    return err(new ParseError("Parser returned no tree", "<source>"));
  }

  if (tree.rootNode.hasError) {
    const errorNode = findFirstError(tree.rootNode);
    const line = errorNode ? errorNode.startPosition.row + 1 : undefined;
    tree.delete();
    return err(new ParseError("Source contains syntax errors", "<source>", line));
  }

  return ok(tree);
}

function findFirstError(node: Node): Node | undefined {
  if (node.isError || node.isMissing) {
    return node;
  }
  for (const child of node.children) {
    if (child && child.hasError) {
      return findFirstError(child) ?? child;
    }
  }
  return undefined;
}

/**
 * Named children without the null holes older typings allow
 */
export function namedChildrenOf(node: Node): Node[] {
  const children: Node[] = [];
  for (const child of node.namedChildren) {
    if (child) {
      children.push(child);
    }
  }
  return children;
}

/**
 * Convert a node's span to 1-indexed inclusive source lines.
 *
 * A node that ends exactly at a line break reports the following row with
 * column 0; that row is not part of the node.
 */
export function lineSpan(node: Node): { startLine: number; endLine: number } {
  const start = node.startPosition;
  const end = node.endPosition;
  const endRow = end.column === 0 && end.row > start.row ? end.row - 1 : end.row;
  return { startLine: start.row + 1, endLine: endRow + 1 };
}

function isCompound(node: Node): boolean {
  return node.type === "block" || node.type.endsWith("_clause") || node.type.endsWith("_definition");
}

function lastCodeChild(node: Node): Node | undefined {
  return namedChildrenOf(node).filter((child) => child.type !== "comment").pop();
}

function codeEndLine(node: Node): number {
  const last = lastCodeChild(node);
  if (last === undefined) {
    return lineSpan(node).endLine;
  }
  if (node.type === "block" || isCompound(last)) {
    return codeEndLine(last);
  }
  return lineSpan(node).endLine;
}

/**
 * Line span of a definition, ending at its last line of code.
 *
 * Comments trailing a body at its indentation belong to the body's block in
 * the tree; they are not part of the definition's span.
 */
export function definitionSpan(node: Node): { startLine: number; endLine: number } {
  const { startLine } = lineSpan(node);
  return { startLine, endLine: Math.max(startLine, codeEndLine(node)) };
}
