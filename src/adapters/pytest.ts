/**
 * Pytest project layout: which files are sources and where their tests live
 */

import { readdir } from "fs/promises";
import { basename, extname, join, posix } from "path";

import { minimatch } from "minimatch";

export const PYTHON_EXTENSIONS = [".py"];

export const PYTEST_FILE_PATTERNS = ["test_*.py", "*_test.py", "conftest.py"];

const TEST_DIRECTORIES = ["tests/", "test/"];

const ALWAYS_SKIPPED_DIRECTORIES = new Set(["__pycache__", "node_modules"]);

function toPosix(path: string): string {
  return path.replace(/\\/g, "/");
}

/**
 * Companion test path for a source file: `src/pkg/mod.py` becomes
 * `<testDir>/src/pkg/test_mod.py`
 */
export function testPathFor(sourceFile: string, testDir: string): string {
  const source = toPosix(sourceFile);
  const testName = `test_${basename(source, extname(source))}.py`;
  const parent = posix.dirname(source);

  return parent === "."
    ? posix.join(toPosix(testDir), testName)
    : posix.join(toPosix(testDir), parent, testName);
}

export function isTestFile(path: string): boolean {
  const normalized = toPosix(path);
  if (TEST_DIRECTORIES.some((dir) => normalized.startsWith(dir) || normalized.includes(`/${dir}`))) {
    return true;
  }
  const fileName = posix.basename(normalized);
  return PYTEST_FILE_PATTERNS.some((pattern) => minimatch(fileName, pattern));
}

/**
 * Keep the files that are Python sources under the include/exclude rules.
 *
 * Patterns are plain substrings of the repository-relative path. An empty
 * include list includes everything.
 */
export function filterSourceFiles(
  files: readonly string[],
  include: readonly string[],
  exclude: readonly string[],
  extensions: readonly string[] = PYTHON_EXTENSIONS
): string[] {
  return files.filter((file) => {
    const path = toPosix(file);

    if (!extensions.includes(posix.extname(path))) return false;
    if (isTestFile(path)) return false;
    if (exclude.some((pattern) => path.includes(pattern))) return false;
    if (include.length > 0 && !include.some((pattern) => path.includes(pattern))) return false;

    return true;
  });
}

/**
 * Every Python source file under `root`, as sorted repository-relative POSIX
 * paths
 */
export async function listSourceFiles(
  root: string,
  include: readonly string[],
  exclude: readonly string[]
): Promise<string[]> {
  const found: string[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const entries = await readdir(join(root, relativeDir), { withFileTypes: true });

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;

      const relativePath = relativeDir === "" ? entry.name : `${relativeDir}/${entry.name}`;

      if (entry.isDirectory()) {
        if (ALWAYS_SKIPPED_DIRECTORIES.has(entry.name)) continue;
        if (exclude.some((pattern) => `${relativePath}/`.includes(pattern))) continue;
        await walk(relativePath);
      } else if (entry.isFile()) {
        found.push(relativePath);
      }
    }
  }

  await walk("");
  return filterSourceFiles(found, include, exclude).sort();
}
