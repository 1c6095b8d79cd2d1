/**
 * Regenerate tests for a list of source files.
 *
 * One file failing does not stop the others; failures are collected into the
 * summary. Reading and writing go through a DocumentStore so the loop never
 * touches the filesystem directly.
 */

import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, join } from "path";

import { logger } from "../lib/logger.js";

import type { RegenerationOutcome, TestRegenerator } from "./orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Text storage keyed by repository-relative path
 */
export interface DocumentStore {
  /** undefined when the document does not exist */
  read(path: string): Promise<string | undefined>;
  write(path: string, text: string): Promise<void>;
}

export interface BatchFile {
  sourcePath: string;
  testPath: string;
}

export interface BatchOptions {
  regenerator: TestRegenerator;
  store: DocumentStore;
  incremental: boolean;
  /** Report what would happen without writing test files */
  dryRun?: boolean;
  /** Called once per file after it is handled */
  onFile?: (file: BatchFile, result: BatchFileResult) => void;
}

export type SkipReason = "covered" | "empty" | "missing-source";

export type BatchFileResult =
  | { status: "generated"; testPath: string }
  | { status: "updated"; testPath: string; targets: string[] }
  | { status: "skipped"; reason: SkipReason }
  | { status: "failed"; message: string };

export interface BatchSummary {
  generated: string[];
  updated: string[];
  skipped: Array<{ file: string; reason: SkipReason }>;
  failed: Array<{ file: string; message: string }>;
  /** Every attempted file failed */
  allFailed: boolean;
}

// =============================================================================
// FILESYSTEM STORE
// =============================================================================

/**
 * DocumentStore over the working tree rooted at `root`
 */
export function createFileStore(root: string): DocumentStore {
  return {
    async read(path: string): Promise<string | undefined> {
      const fullPath = join(root, path);
      if (!existsSync(fullPath)) {
        return undefined;
      }
      return readFile(fullPath, "utf-8");
    },
    async write(path: string, text: string): Promise<void> {
      const fullPath = join(root, path);
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, text, "utf-8");
    },
  };
}

// =============================================================================
// BATCH
// =============================================================================

function toFileResult(outcome: RegenerationOutcome, testPath: string): BatchFileResult {
  switch (outcome.kind) {
    case "generated":
      return { status: "generated", testPath };
    case "updated":
      return { status: "updated", testPath, targets: outcome.targets.map((callable) => callable.name) };
    case "covered":
      return { status: "skipped", reason: "covered" };
    case "empty":
      return { status: "skipped", reason: "empty" };
  }
}

async function processFile(file: BatchFile, options: BatchOptions): Promise<BatchFileResult> {
  const sourceText = await options.store.read(file.sourcePath);
  if (sourceText === undefined) {
    return { status: "skipped", reason: "missing-source" };
  }

  const existingTestText = await options.store.read(file.testPath);
  const result = await options.regenerator.regenerate({
    sourcePath: file.sourcePath,
    sourceText,
    ...(existingTestText !== undefined ? { existingTestText } : {}),
    incremental: options.incremental,
  });

  if (!result.success) {
    return { status: "failed", message: result.error.message };
  }

  const outcome = result.data;
  if ((outcome.kind === "generated" || outcome.kind === "updated") && options.dryRun !== true) {
    await options.store.write(file.testPath, outcome.testText);
  }

  return toFileResult(outcome, file.testPath);
}

/**
 * Regenerate tests for each file in order
 */
export async function runBatch(files: readonly BatchFile[], options: BatchOptions): Promise<BatchSummary> {
  const log = logger.child("[batch]");
  const summary: BatchSummary = {
    generated: [],
    updated: [],
    skipped: [],
    failed: [],
    allFailed: false,
  };

  for (const file of files) {
    let result: BatchFileResult;
    try {
      result = await processFile(file, options);
    } catch (error) {
      result = { status: "failed", message: error instanceof Error ? error.message : String(error) };
    }

    switch (result.status) {
      case "generated":
        summary.generated.push(file.sourcePath);
        break;
      case "updated":
        summary.updated.push(file.sourcePath);
        break;
      case "skipped":
        summary.skipped.push({ file: file.sourcePath, reason: result.reason });
        break;
      case "failed":
        log.warn(`${file.sourcePath}: ${result.message}`);
        summary.failed.push({ file: file.sourcePath, message: result.message });
        break;
    }

    options.onFile?.(file, result);
  }

  summary.allFailed = files.length > 0 && summary.failed.length === files.length;
  return summary;
}
