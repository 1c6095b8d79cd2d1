#!/usr/bin/env node
/**
 * gapfill CLI entry point
 *
 * Commands:
 * - init         - Write .gapfill.yml in the repository root
 * - coverage     - List public callables that no test references
 * - create-tests - Generate or extend pytest files
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerCoverageCommand } from "./commands/coverage.js";
import { registerCreateTestsCommand } from "./commands/create-tests.js";
import { registerInitCommand } from "./commands/init.js";

const program = new Command();

program
  .name("gapfill")
  .description("Find untested Python functions and generate pytest tests for them")
  .version(VERSION);

registerInitCommand(program);
registerCoverageCommand(program);
registerCreateTestsCommand(program);

await program.parseAsync();
