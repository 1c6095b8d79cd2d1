/**
 * Core analysis engine
 *
 * This module contains:
 * - syntax/   - Python parsing with tree-sitter
 * - coverage/ - Callable inventory, test references and the untested set
 */

export const VERSION = "0.1.0";

export {
  getPythonParser,
  parsePython,
  type SyntaxNode,
  type SyntaxTree,
} from "./syntax/python-parser.js";

export * from "./coverage/index.js";
