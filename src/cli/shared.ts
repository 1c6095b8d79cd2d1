/**
 * Shared CLI utilities
 */

import { resolve, relative } from "path";

import { filterSourceFiles, listSourceFiles } from "../adapters/pytest.js";
import { getChangedFilesSinceBase } from "../git/changes.js";
import { ConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, ok } from "../lib/result.js";
import type { Result } from "../lib/result.js";

import { findRepoRoot, loadProjectConfig } from "./config.js";
import type { ProjectConfig } from "./config.js";
import { formatError } from "./formatters.js";

export interface RepoContext {
  root: string;
  config: ProjectConfig;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Print an error and exit with status 1
 */
export function fail(error: unknown): never {
  console.error(formatError(toError(error)));
  process.exit(1);
}

/**
 * Apply -v / -q to the shared logger
 */
export function applyVerbosity(options: { verbose?: boolean; quiet?: boolean }): void {
  if (options.quiet === true) {
    logger.configure({ level: "error" });
  } else if (options.verbose === true) {
    logger.configure({ level: "debug" });
  }
}

/**
 * Locate the repository and load `.gapfill.yml`
 */
export async function loadRepoContext(cwd: string = process.cwd()): Promise<Result<RepoContext, ConfigError>> {
  const root = findRepoRoot(cwd);
  if (root === undefined) {
    return err(new ConfigError("Not inside a git repository", { cwd }));
  }

  const config = await loadProjectConfig(root);
  if (!config.success) {
    return config;
  }
  return ok({ root, config: config.data });
}

export interface FileSelection {
  /** Explicit paths, relative to the current directory */
  paths?: string[];
  /** Only files changed since the base branch */
  changed?: boolean;
}

/**
 * Source files to work on, as repository-relative paths
 */
export async function selectSourceFiles(context: RepoContext, selection: FileSelection): Promise<string[]> {
  const { root, config } = context;

  if (selection.paths !== undefined && selection.paths.length > 0) {
    const relativePaths = selection.paths.map((path) => relative(root, resolve(path)).replace(/\\/g, "/"));
    return filterSourceFiles(relativePaths, [], config.exclude);
  }

  if (selection.changed === true) {
    const changed = await getChangedFilesSinceBase(config.baseBranch, root);
    return filterSourceFiles(changed, config.include, config.exclude).sort();
  }

  return listSourceFiles(root, config.include, config.exclude);
}
