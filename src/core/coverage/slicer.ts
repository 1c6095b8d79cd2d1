/**
 * Source slicing: the verbatim text of selected callables.
 */

import { extractInventory } from "./inventory.js";
import type { CallableDescriptor } from "./types.js";

const FRAGMENT_SEPARATOR = "\n\n";

/**
 * Text of one callable's inclusive line range, byte for byte
 */
export function sliceCallable(source: string, callable: CallableDescriptor): string {
  return source
    .split("\n")
    .slice(callable.startLine - 1, callable.endLine)
    .join("\n");
}

/**
 * Concatenate the slices of several callables, in the order given, with one
 * blank line between them
 */
export function sliceSource(source: string, callables: readonly CallableDescriptor[]): string {
  return callables.map((callable) => sliceCallable(source, callable)).join(FRAGMENT_SEPARATOR);
}

/**
 * Slice callables by name against a fresh inventory of `source`.
 *
 * Every callable carrying a requested name is included (same-named methods of
 * different classes included); names the fresh inventory lacks are skipped.
 */
export async function sliceCallables(source: string, names: readonly string[]): Promise<string> {
  const inventory = await extractInventory(source);
  const selected: CallableDescriptor[] = [];

  for (const name of new Set(names)) {
    for (const callable of inventory) {
      if (callable.name === name) {
        selected.push(callable);
      }
    }
  }

  return sliceSource(source, selected);
}
