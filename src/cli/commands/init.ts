/**
 * Init command - write `.gapfill.yml` and create the test directory
 */

import { existsSync } from "fs";
import { mkdir } from "fs/promises";
import { join } from "path";

import chalk from "chalk";

import type { Command } from "commander";

import { CONFIG_FILE, defaultProjectConfig, findRepoRoot, getConfigPath, saveProjectConfig } from "../config.js";
import { formatSuccess } from "../formatters.js";
import { fail } from "../shared.js";

interface InitOptions {
  baseBranch?: string;
  testDir?: string;
  force?: boolean;
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description(`Create ${CONFIG_FILE} in the repository root`)
    .option("-b, --base-branch <branch>", "Branch that changes are compared against", "main")
    .option("-t, --test-dir <dir>", "Directory for generated tests", "tests/")
    .option("-f, --force", "Overwrite existing configuration")
    .action(async (options: InitOptions) => {
      const root = findRepoRoot();
      if (root === undefined) {
        fail(new Error("Not inside a git repository. Run 'git init' first."));
      }

      if (existsSync(getConfigPath(root)) && options.force !== true) {
        console.log(chalk.yellow(`Configuration file already exists at ${CONFIG_FILE}`));
        console.log(chalk.gray("Use --force to overwrite."));
        return;
      }

      try {
        const config = defaultProjectConfig({
          baseBranch: options.baseBranch ?? "main",
          testDir: options.testDir ?? "tests/",
        });

        await saveProjectConfig(config, root);
        console.log(formatSuccess(`Created ${CONFIG_FILE}`));

        await mkdir(join(root, config.testDir), { recursive: true });
        console.log(formatSuccess(`Created ${config.testDir}`));

        console.log();
        console.log(chalk.bold("gapfill initialized."));
        console.log();
        console.log("Next steps:");
        console.log(chalk.gray(`  1. Review ${CONFIG_FILE}`));
        console.log(chalk.gray("  2. Run: gapfill coverage"));
        console.log(chalk.gray("  3. Generate tests: gapfill create-tests --update --incremental"));
      } catch (error) {
        fail(error);
      }
    });
}
