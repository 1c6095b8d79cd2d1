/**
 * Reference inference: which names a test module imports or calls.
 *
 * Matching is by bare name only. `from mod import add as plus` records `add`
 * (the imported name), and a later `plus()` call records `plus`; nothing
 * checks that a name really comes from the module under test.
 */

import { logger } from "../../lib/logger.js";
import { namedChildrenOf, parsePython } from "../syntax/python-parser.js";
import type { SyntaxNode } from "../syntax/python-parser.js";

import type { ReferenceSet } from "./types.js";

const log = logger.child("[references]");

/**
 * The imported name of a `dotted_name` or `aliased_import` entry
 */
function importedName(entry: SyntaxNode): string | undefined {
  if (entry.type === "aliased_import") {
    return entry.childForFieldName("name")?.text;
  }
  if (entry.type === "dotted_name") {
    return entry.text;
  }
  return undefined;
}

function addImportNames(node: SyntaxNode, names: Set<string>): void {
  for (const entry of node.childrenForFieldName("name")) {
    if (!entry) continue;
    const name = importedName(entry);
    if (name) {
      names.add(name);
    }
  }
}

function addCallee(call: SyntaxNode, names: Set<string>): void {
  const callee = call.childForFieldName("function");
  if (!callee) return;

  if (callee.type === "identifier") {
    names.add(callee.text);
  } else if (callee.type === "attribute") {
    const attribute = callee.childForFieldName("attribute");
    if (attribute) {
      names.add(attribute.text);
    }
  }
}

function walk(node: SyntaxNode, names: Set<string>): void {
  switch (node.type) {
    case "import_from_statement":
    case "import_statement":
      addImportNames(node, names);
      return;
    case "call":
      addCallee(node, names);
      break;
  }

  for (const child of namedChildrenOf(node)) {
    walk(child, names);
  }
}

/**
 * Collect referenced names from a test module.
 *
 * A module that does not parse references nothing. A parser that cannot be
 * loaded throws `ParserUnavailableError`.
 */
export async function extractReferences(testSource: string): Promise<ReferenceSet> {
  const parsed = await parsePython(testSource);
  if (!parsed.success) {
    log.debug(`no references: ${parsed.error.message}`);
    return new Set<string>();
  }

  const tree = parsed.data;
  try {
    const names = new Set<string>();
    walk(tree.rootNode, names);
    return names;
  } finally {
    tree.delete();
  }
}
