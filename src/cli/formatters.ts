import chalk from "chalk";

import type { FileCoverage } from "../core/coverage/report.js";
import { summarizeCoverage } from "../core/coverage/report.js";
import type { BatchSummary } from "../testgen/batch.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json"];

export function isValidOutputFormat(format: string): format is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(format);
}

/**
 * Format coverage reports for terminal output with colors
 */
export function formatCoverageTerminal(reports: readonly FileCoverage[]): string {
  if (reports.length === 0) {
    return chalk.yellow("No Python source files found.");
  }

  const lines: string[] = [];

  for (const report of reports) {
    if (report.untested.length === 0) {
      lines.push(`${chalk.green("✓")} ${report.sourcePath} ${chalk.gray(`(${report.publicCount} public)`)}`);
      continue;
    }

    const status = report.testExists ? chalk.yellow("~") : chalk.red("✗");
    const note = report.testExists ? report.testPath : "no test file";
    lines.push(`${status} ${chalk.bold(report.sourcePath)} ${chalk.gray(`(${note})`)}`);

    for (const callable of report.untested) {
      const owner = callable.enclosingType !== undefined ? chalk.gray(`${callable.enclosingType}.`) : "";
      lines.push(`    ${owner}${callable.name} ${chalk.gray(`lines ${callable.startLine}-${callable.endLine}`)}`);
    }
  }

  const totals = summarizeCoverage(reports);
  lines.push("");
  lines.push(chalk.gray("─".repeat(40)));
  lines.push(
    `${chalk.bold(String(totals.untestedCallables))} untested of ${totals.publicCallables} public callables ` +
      `in ${totals.files} files (${totals.filesWithoutTests} without tests)`
  );

  return lines.join("\n");
}

export function formatCoverageJson(reports: readonly FileCoverage[]): string {
  return JSON.stringify({ files: reports, totals: summarizeCoverage(reports) }, null, 2);
}

/**
 * Format a batch summary for terminal output
 */
export function formatBatchTerminal(summary: BatchSummary, dryRun: boolean): string {
  const lines: string[] = [];
  const verb = dryRun ? "Would write" : "Wrote";

  if (summary.generated.length > 0) {
    lines.push(chalk.green(`${verb} ${summary.generated.length} new test file(s)`));
  }
  if (summary.updated.length > 0) {
    lines.push(chalk.green(`${dryRun ? "Would update" : "Updated"} ${summary.updated.length} test file(s)`));
  }

  const covered = summary.skipped.filter((skip) => skip.reason === "covered").length;
  if (covered > 0) {
    lines.push(chalk.gray(`${covered} file(s) already covered`));
  }
  for (const skip of summary.skipped.filter((entry) => entry.reason !== "covered")) {
    lines.push(formatWarning(`${skip.file}: skipped (${skip.reason})`));
  }
  for (const failure of summary.failed) {
    lines.push(chalk.red(`✗ ${failure.file}: ${failure.message}`));
  }

  if (lines.length === 0) {
    lines.push(chalk.gray("Nothing to do."));
  }

  return lines.join("\n");
}

export function formatBatchJson(summary: BatchSummary): string {
  return JSON.stringify(summary, null, 2);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
