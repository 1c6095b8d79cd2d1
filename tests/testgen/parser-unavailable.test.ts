import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { extractInventory } from "@/core/coverage/inventory.js";
import { extractReferences } from "@/core/coverage/references.js";
import { getPythonParser } from "@/core/syntax/python-parser.js";
import { ParserUnavailableError } from "@/lib/errors.js";
import { logger } from "@/lib/logger.js";
import { runBatch } from "@/testgen/batch.js";
import { TestRegenerator } from "@/testgen/orchestrator.js";
import type { GenerationBackend } from "@/testgen/orchestrator.js";

import { CALC_SOURCE, CALC_TESTS_ADD_ONLY, createMemoryStore } from "../fixtures/python.js";

// No WASM file can be found, so the parser never initialises
vi.mock("fs", async (importOriginal) => ({
  ...(await importOriginal<typeof import("fs")>()),
  existsSync: vi.fn(() => false),
}));

function fakeBackend() {
  const generateTests = vi.fn(async (_prompt: string) => "def test_x():\n    pass");
  const backend: GenerationBackend = { generateTests };
  return { backend, generateTests };
}

describe("without a loadable parser", () => {
  beforeEach(() => {
    logger.configure({ level: "silent" });
  });

  afterEach(() => {
    logger.configure({ level: "info" });
  });

  it("reports the missing runtime WASM", async () => {
    const result = await getPythonParser();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ParserUnavailableError);
      expect(result.error.message).toBe("tree-sitter.wasm not found; is web-tree-sitter installed?");
      expect(result.error.wasmPath).toBe("tree-sitter.wasm");
    }
  });

  it("throws from extractInventory instead of returning an empty inventory", async () => {
    await expect(extractInventory(CALC_SOURCE)).rejects.toBeInstanceOf(ParserUnavailableError);
  });

  it("throws from extractReferences instead of returning no references", async () => {
    await expect(extractReferences(CALC_TESTS_ADD_ONLY)).rejects.toBeInstanceOf(ParserUnavailableError);
  });

  it("fails incremental regeneration without calling the backend", async () => {
    const { backend, generateTests } = fakeBackend();
    const regenerator = new TestRegenerator(backend);

    const result = await regenerator.regenerate({
      sourcePath: "src/calc.py",
      sourceText: CALC_SOURCE,
      existingTestText: CALC_TESTS_ADD_ONLY,
      incremental: true,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ParserUnavailableError);
      expect(result.error.code).toBe("PARSER_UNAVAILABLE");
    }
    expect(generateTests).not.toHaveBeenCalled();
  });

  it("records the file as failed in a batch and leaves the tests untouched", async () => {
    const { backend } = fakeBackend();
    const store = createMemoryStore({
      "src/calc.py": CALC_SOURCE,
      "tests/src/test_calc.py": CALC_TESTS_ADD_ONLY,
    });

    const summary = await runBatch([{ sourcePath: "src/calc.py", testPath: "tests/src/test_calc.py" }], {
      regenerator: new TestRegenerator(backend),
      store,
      incremental: true,
    });

    expect(summary).toEqual({
      generated: [],
      updated: [],
      skipped: [],
      failed: [{ file: "src/calc.py", message: "tree-sitter.wasm not found; is web-tree-sitter installed?" }],
      allFailed: true,
    });
    expect(await store.read("tests/src/test_calc.py")).toBe(CALC_TESTS_ADD_ONLY);
  });
});
