/**
 * Per-file coverage report, without any generation
 */

import { diffCoverage } from "./differ.js";
import { extractInventory } from "./inventory.js";
import { extractReferences } from "./references.js";
import type { CallableDescriptor } from "./types.js";

export interface FileCoverage {
  sourcePath: string;
  testPath: string;
  testExists: boolean;
  publicCount: number;
  untested: CallableDescriptor[];
}

export interface CoverageTotals {
  files: number;
  publicCallables: number;
  untestedCallables: number;
  filesWithoutTests: number;
}

export async function analyzeFileCoverage(
  sourcePath: string,
  sourceText: string,
  testPath: string,
  testText: string | undefined
): Promise<FileCoverage> {
  const inventory = await extractInventory(sourceText);
  const references = testText === undefined ? undefined : await extractReferences(testText);

  return {
    sourcePath,
    testPath,
    testExists: testText !== undefined,
    publicCount: inventory.length,
    untested: diffCoverage(inventory, references),
  };
}

export function summarizeCoverage(reports: readonly FileCoverage[]): CoverageTotals {
  return {
    files: reports.length,
    publicCallables: reports.reduce((sum, report) => sum + report.publicCount, 0),
    untestedCallables: reports.reduce((sum, report) => sum + report.untested.length, 0),
    filesWithoutTests: reports.filter((report) => !report.testExists).length,
  };
}
