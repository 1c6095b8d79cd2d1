import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import {
  CONFIG_FILE,
  defaultProjectConfig,
  findRepoRoot,
  loadProjectConfig,
  parseProjectConfig,
  saveProjectConfig,
} from "@/cli/config.js";

const DEFAULTS = {
  baseBranch: "main",
  language: "python",
  testFramework: "pytest",
  testDir: "tests/",
  include: ["src/"],
  exclude: ["venv/", "node_modules/"],
};

describe("parseProjectConfig", () => {
  it("applies defaults to an empty file", () => {
    expect(parseProjectConfig("")).toEqual({ success: true, data: DEFAULTS });
  });

  it("reads branch and AI settings", () => {
    const result = parseProjectConfig("baseBranch: develop\nai:\n  provider: openai\n  temperature: 0.5\n");

    expect(result).toEqual({
      success: true,
      data: { ...DEFAULTS, baseBranch: "develop", ai: { provider: "openai", temperature: 0.5 } },
    });
  });

  it("rejects invalid YAML", () => {
    const result = parseProjectConfig("baseBranch: [unclosed");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message.startsWith(`Invalid YAML in ${CONFIG_FILE}:`)).toBe(true);
    }
  });

  it("names the offending field", () => {
    const result = parseProjectConfig("ai:\n  provider: llama\n");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message.startsWith(`Invalid configuration in ${CONFIG_FILE}: ai.provider:`)).toBe(true);
    }
  });

  it("rejects an unsupported language", () => {
    expect(parseProjectConfig("language: ruby\n").success).toBe(false);
  });
});

describe("project config on disk", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "gapfill-config-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reports a missing file", async () => {
    const result = await loadProjectConfig(root);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.context).toMatchObject({ reason: "missing" });
    }
  });

  it("saves and loads the same configuration", async () => {
    const config = defaultProjectConfig({ baseBranch: "trunk", testDir: "spec/" });

    const path = await saveProjectConfig(config, root);

    expect(path).toBe(join(root, CONFIG_FILE));
    expect((await readFile(path, "utf-8")).split("\n")[0]).toBe("# gapfill configuration");
    expect(await loadProjectConfig(root)).toEqual({ success: true, data: config });
  });

  it("reports invalid content distinctly from a missing file", async () => {
    await writeFile(join(root, CONFIG_FILE), "testDir: ''\n", "utf-8");

    const result = await loadProjectConfig(root);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.context).not.toMatchObject({ reason: "missing" });
      expect(result.error.message).toContain("testDir:");
    }
  });

  it("finds the repository root from a nested directory", async () => {
    await mkdir(join(root, ".git"));
    await mkdir(join(root, "src", "pkg"), { recursive: true });

    expect(findRepoRoot(join(root, "src", "pkg"))).toBe(root);
  });
});
