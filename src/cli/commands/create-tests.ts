/**
 * Create-tests command - generate or extend pytest files
 *
 * Without --update only source files that have no test file yet are
 * considered. --incremental keeps existing tests and appends tests for the
 * callables they do not reference.
 */

import { existsSync } from "fs";
import { join } from "path";

import chalk from "chalk";
import ora from "ora";

import { InvalidArgumentError } from "commander";
import type { Command } from "commander";

import { testPathFor } from "../../adapters/pytest.js";
import { resolveAIConfig } from "../../ai/config.js";
import { createAIService } from "../../ai/service.js";
import { createFileStore, runBatch } from "../../testgen/batch.js";
import type { BatchFile } from "../../testgen/batch.js";
import { createTestRegenerator } from "../../testgen/orchestrator.js";
import { formatBatchJson, formatBatchTerminal, isValidOutputFormat } from "../formatters.js";
import { applyVerbosity, fail, loadRepoContext, selectSourceFiles } from "../shared.js";

interface CreateTestsOptions {
  update?: boolean;
  incremental?: boolean;
  changed?: boolean;
  dryRun?: boolean;
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  apiKey?: string;
  output: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

export function registerCreateTestsCommand(program: Command): void {
  program
    .command("create-tests")
    .description("Generate tests for source files")
    .option("--update", "Also regenerate files that already have tests")
    .option("--incremental", "Append tests for untested callables only (implies --update)")
    .option("--changed", "Only files changed since the base branch")
    .option("--dry-run", "Report what would be written without writing")
    .option("--provider <provider>", "AI provider: anthropic, openai, gemini, mock")
    .option("--model <model>", "Model name")
    .option("--temperature <value>", "Sampling temperature (0-2)", parseNumberOption)
    .option("--max-tokens <count>", "Maximum tokens per response", parseNumberOption)
    .option("--api-key <key>", "API key (defaults to the provider's environment variable)")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (options: CreateTestsOptions) => {
      applyVerbosity(options);

      if (!isValidOutputFormat(options.output)) {
        fail(new Error(`Invalid output format: ${options.output}. Use: terminal, json`));
      }
      const isTerminal = options.output === "terminal";
      const incremental = options.incremental === true;
      const update = incremental || options.update === true;
      const dryRun = options.dryRun === true;

      const context = await loadRepoContext();
      if (!context.success) {
        fail(context.error);
      }
      const { root, config } = context.data;

      const aiConfig = resolveAIConfig(config.ai, {
        ...(options.provider !== undefined ? { provider: options.provider } : {}),
        ...(options.model !== undefined ? { model: options.model } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
        ...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
      });
      if (!aiConfig.success) {
        fail(aiConfig.error);
      }

      const service = createAIService(aiConfig.data);
      if (!service.isConfigured()) {
        fail(new Error(`No API key for ${service.getProvider()}. Set it in the environment or pass --api-key.`));
      }

      let files: BatchFile[];
      try {
        const sources = await selectSourceFiles(context.data, { changed: options.changed ?? false });
        files = sources
          .map((sourcePath) => ({ sourcePath, testPath: testPathFor(sourcePath, config.testDir) }))
          .filter((file) => update || !existsSync(join(root, file.testPath)));
      } catch (error) {
        fail(error);
      }

      if (files.length === 0) {
        if (isTerminal) {
          console.log(update
            ? chalk.yellow("No source files found to update tests for")
            : chalk.green("All source files already have tests. Use --update to regenerate them."));
        } else {
          console.log(formatBatchJson({ generated: [], updated: [], skipped: [], failed: [], allFailed: false }));
        }
        return;
      }

      if (isTerminal && options.quiet !== true) {
        console.log(chalk.cyan(`Using ${service.getProvider()} (${service.getModel()}) for ${files.length} file(s)`));
      }

      const spinner = isTerminal && options.quiet !== true ? ora().start() : null;
      const summary = await runBatch(files, {
        regenerator: createTestRegenerator(service),
        store: createFileStore(root),
        incremental,
        dryRun,
        onFile: (file, result) => {
          if (spinner === null) return;
          const label = `${file.sourcePath} → ${file.testPath}`;
          switch (result.status) {
            case "generated":
              spinner.succeed(label);
              break;
            case "updated":
              spinner.succeed(`${label} ${chalk.gray(`(+${result.targets.join(", ")})`)}`);
              break;
            case "skipped":
              spinner.info(`${file.sourcePath} ${chalk.gray(result.reason)}`);
              break;
            case "failed":
              spinner.fail(`${file.sourcePath} ${chalk.red(result.message)}`);
              break;
          }
          spinner.start();
        },
      });
      spinner?.stop();

      console.log(isTerminal ? formatBatchTerminal(summary, dryRun) : formatBatchJson(summary));

      if (summary.allFailed) {
        process.exit(1);
      }
    });
}
