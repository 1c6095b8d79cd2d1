/**
 * Coverage diff: inventory minus references.
 */

import { extractInventory } from "./inventory.js";
import { extractReferences } from "./references.js";
import type { CallableDescriptor, ReferenceSet } from "./types.js";

/**
 * Callables whose name is not referenced, by ascending start line.
 *
 * `undefined` references means there is no test document at all, so the
 * whole inventory is untested.
 */
export function diffCoverage(
  inventory: readonly CallableDescriptor[],
  references: ReferenceSet | undefined
): CallableDescriptor[] {
  const untested = references === undefined
    ? [...inventory]
    : inventory.filter((callable) => !references.has(callable.name));

  return untested.sort((a, b) => a.startLine - b.startLine);
}

/**
 * Untested public callables of a source module against its test module
 */
export async function findUntestedCallables(
  source: string,
  testSource?: string
): Promise<CallableDescriptor[]> {
  const inventory = await extractInventory(source);
  if (testSource === undefined) {
    return diffCoverage(inventory, undefined);
  }
  const references = await extractReferences(testSource);
  return diffCoverage(inventory, references);
}
