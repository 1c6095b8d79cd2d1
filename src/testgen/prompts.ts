/**
 * Prompts for pytest generation
 */

import { basename, extname } from "path";

function testFileName(sourcePath: string): string {
  return `test_${basename(sourcePath, extname(sourcePath))}.py`;
}

/**
 * Prompt covering a whole module (full mode)
 */
export function buildFullPrompt(sourcePath: string, source: string): string {
  const parts: string[] = [];

  parts.push("Generate pytest tests for the following Python file.");
  parts.push("");
  parts.push("Rules:");
  parts.push("- Only test public functions and methods (those not starting with _)");
  parts.push("- Do not invent imports - only use imports that are actually in the file or standard library");
  parts.push("- Use pytest");
  parts.push("- Keep tests minimal and readable");
  parts.push(`- Test file should be named ${testFileName(sourcePath)}`);
  parts.push("- Import the module/function being tested correctly based on the file path");
  parts.push("- Do not generate tests for private methods (starting with _)");
  parts.push("- Focus on testing the public API");
  parts.push("");
  parts.push(`File: ${sourcePath}`);
  parts.push("");
  parts.push("```python");
  parts.push(source);
  parts.push("```");
  parts.push("");
  parts.push("Generate only the test code, without any explanations or markdown formatting.");

  return parts.join("\n");
}

/**
 * Prompt restricted to the listed callables (incremental mode)
 */
export function buildScopedPrompt(sourcePath: string, slicedSource: string, names: readonly string[]): string {
  const parts: string[] = [];

  parts.push(`Generate pytest tests for the following functions from ${sourcePath}.`);
  parts.push("");
  parts.push(`Functions to test: ${names.join(", ")}`);
  parts.push("");
  parts.push("Rules:");
  parts.push("- Only test the specified functions (do not generate tests for functions not shown)");
  parts.push("- Call every listed function at least once");
  parts.push("- Do not invent imports - only use imports that are actually in the file or standard library");
  parts.push("- Use pytest");
  parts.push("- Keep tests minimal and readable");
  parts.push("- Import the module/function being tested correctly based on the file path");
  parts.push("- The tests are appended to an existing test file; do not repeat its imports or fixtures");
  parts.push("");
  parts.push("```python");
  parts.push(slicedSource);
  parts.push("```");
  parts.push("");
  parts.push("Generate only the test code for these functions, without any explanations or markdown formatting.");

  return parts.join("\n");
}
