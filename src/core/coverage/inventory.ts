/**
 * Symbol inventory: the public callables a Python module defines.
 */

import { logger } from "../../lib/logger.js";
import { definitionSpan, namedChildrenOf, parsePython } from "../syntax/python-parser.js";
import type { SyntaxNode } from "../syntax/python-parser.js";

import { PRIVATE_NAME_MARKER } from "./types.js";
import type { CallableDescriptor } from "./types.js";

const log = logger.child("[inventory]");

export function isPublicName(name: string): boolean {
  return name.length > 0 && !name.startsWith(PRIVATE_NAME_MARKER);
}

/**
 * Walk the tree collecting function definitions.
 *
 * `enclosingType` is carried through a class body, including its decorators
 * and control-flow blocks, and dropped on entering a function body.
 */
function collect(node: SyntaxNode, enclosingType: string | undefined, out: CallableDescriptor[]): void {
  for (const child of namedChildrenOf(node)) {
    switch (child.type) {
      case "class_definition": {
        const className = child.childForFieldName("name")?.text;
        const body = child.childForFieldName("body");
        if (body) {
          collect(body, className, out);
        }
        break;
      }

      case "function_definition": {
        const name = child.childForFieldName("name")?.text ?? "";
        if (isPublicName(name)) {
          const { startLine, endLine } = definitionSpan(child);
          out.push(
            enclosingType === undefined
              ? { name, startLine, endLine }
              : { name, startLine, endLine, enclosingType }
          );
        }
        const body = child.childForFieldName("body");
        if (body) {
          collect(body, undefined, out);
        }
        break;
      }

      default:
        collect(child, enclosingType, out);
    }
  }
}

/**
 * List public callables in source order.
 *
 * Source that does not parse yields an empty inventory. A parser that
 * cannot be loaded throws `ParserUnavailableError`.
 */
export async function extractInventory(source: string): Promise<CallableDescriptor[]> {
  const parsed = await parsePython(source);
  if (!parsed.success) {
    log.debug(`no inventory: ${parsed.error.message}`);
    return [];
  }

  const tree = parsed.data;
  try {
    const callables: CallableDescriptor[] = [];
    collect(tree.rootNode, undefined, callables);
    return callables.sort((a, b) => a.startLine - b.startLine);
  } finally {
    tree.delete();
  }
}
