/**
 * Coverage command - list public callables no companion test references
 */

import chalk from "chalk";
import ora from "ora";

import type { Command } from "commander";

import { testPathFor } from "../../adapters/pytest.js";
import { analyzeFileCoverage } from "../../core/coverage/report.js";
import type { FileCoverage } from "../../core/coverage/report.js";
import { createFileStore } from "../../testgen/batch.js";
import { formatCoverageJson, formatCoverageTerminal, isValidOutputFormat } from "../formatters.js";
import { applyVerbosity, fail, loadRepoContext, selectSourceFiles } from "../shared.js";

interface CoverageOptions {
  output: string;
  changed?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export function registerCoverageCommand(program: Command): void {
  program
    .command("coverage [paths...]")
    .description("Show public functions and methods that no test references")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("--changed", "Only files changed since the base branch")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (paths: string[], options: CoverageOptions) => {
      applyVerbosity(options);

      if (!isValidOutputFormat(options.output)) {
        fail(new Error(`Invalid output format: ${options.output}. Use: terminal, json`));
      }
      const isTerminal = options.output === "terminal";

      const context = await loadRepoContext();
      if (!context.success) {
        fail(context.error);
      }
      const { root, config } = context.data;

      const spinner = isTerminal && options.quiet !== true ? ora("Analyzing coverage...").start() : null;

      try {
        const files = await selectSourceFiles(context.data, { paths, changed: options.changed ?? false });
        const store = createFileStore(root);
        const reports: FileCoverage[] = [];

        for (const sourcePath of files) {
          const sourceText = await store.read(sourcePath);
          if (sourceText === undefined) continue;

          const testPath = testPathFor(sourcePath, config.testDir);
          reports.push(await analyzeFileCoverage(sourcePath, sourceText, testPath, await store.read(testPath)));
        }

        spinner?.stop();
        console.log(isTerminal ? formatCoverageTerminal(reports) : formatCoverageJson(reports));
      } catch (error) {
        spinner?.fail(chalk.red("Coverage analysis failed"));
        fail(error);
      }
    });
}
