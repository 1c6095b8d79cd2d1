/**
 * Project configuration
 *
 * `.gapfill.yml` at the repository root holds the branch, layout and AI
 * settings. API keys are never stored here; they come from the environment.
 */

import { existsSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { dirname, join, resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";
import type { Result } from "../lib/result.js";
import { AI_PROVIDERS } from "../ai/types.js";

export const CONFIG_FILE = ".gapfill.yml";

const AISectionSchema = z.object({
  provider: z.enum(AI_PROVIDERS).optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

export const ProjectConfigSchema = z.object({
  baseBranch: z.string().min(1).default("main"),
  language: z.literal("python").default("python"),
  testFramework: z.literal("pytest").default("pytest"),
  testDir: z.string().min(1).default("tests/"),
  include: z.array(z.string()).default(["src/"]),
  exclude: z.array(z.string()).default(["venv/", "node_modules/"]),
  ai: AISectionSchema.optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type AISection = z.infer<typeof AISectionSchema>;

/**
 * Configuration with every default applied
 */
export function defaultProjectConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return ProjectConfigSchema.parse(overrides);
}

/**
 * Find the git repository root by walking up to a `.git` entry
 */
export function findRepoRoot(startPath: string = process.cwd()): string | undefined {
  let current = resolve(startPath);

  for (;;) {
    if (existsSync(join(current, ".git"))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

export function getConfigPath(repoRoot: string): string {
  return join(repoRoot, CONFIG_FILE);
}

/**
 * Parse and validate configuration text
 */
export function parseProjectConfig(text: string, source = CONFIG_FILE): Result<ProjectConfig, ConfigError> {
  let data: unknown;
  try {
    data = YAML.parse(text) ?? {};
  } catch (error) {
    return err(new ConfigError(
      `Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    ));
  }

  const parsed = ProjectConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return err(new ConfigError(`Invalid configuration in ${source}: ${issues.join("; ")}`, { source, issues }));
  }

  return ok(parsed.data);
}

/**
 * Load `.gapfill.yml` from the repository root
 */
export async function loadProjectConfig(repoRoot: string): Promise<Result<ProjectConfig, ConfigError>> {
  const configPath = getConfigPath(repoRoot);

  if (!existsSync(configPath)) {
    return err(new ConfigError(
      `gapfill is not initialized. Run 'gapfill init' first. Expected config at ${configPath}`,
      { configPath, reason: "missing" }
    ));
  }

  try {
    const text = await readFile(configPath, "utf-8");
    return parseProjectConfig(text, configPath);
  } catch (error) {
    return err(new ConfigError(
      `Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath }
    ));
  }
}

/**
 * Write `.gapfill.yml` to the repository root
 */
export async function saveProjectConfig(config: ProjectConfig, repoRoot: string): Promise<string> {
  const configPath = getConfigPath(repoRoot);
  const body = YAML.stringify(config);
  await writeFile(configPath, `# gapfill configuration\n${body}`, "utf-8");
  return configPath;
}
