import { describe, it, expect } from "vitest";

import { sliceCallable, sliceCallables, sliceSource } from "@/core/coverage/slicer.js";

import { CALC_SOURCE, CLASS_SOURCE } from "../../fixtures/python.js";

describe("sliceCallable", () => {
  it("returns the inclusive line range verbatim", () => {
    const slice = sliceCallable(CALC_SOURCE, { name: "subtract", startLine: 8, endLine: 9 });
    expect(slice).toBe("def subtract(a, b):\n    return a - b");
  });

  it("keeps indentation of methods", () => {
    const slice = sliceCallable(CLASS_SOURCE, { name: "fetch", startLine: 15, endLine: 16 });
    expect(slice).toBe("    async def fetch(self):\n        return self.total");
  });
});

describe("sliceSource", () => {
  it("joins slices with one blank line", () => {
    const slice = sliceSource(CALC_SOURCE, [
      { name: "add", startLine: 4, endLine: 5 },
      { name: "subtract", startLine: 8, endLine: 9 },
    ]);
    expect(slice).toBe("def add(a, b):\n    return a + b\n\ndef subtract(a, b):\n    return a - b");
  });

  it("is empty for no callables", () => {
    expect(sliceSource(CALC_SOURCE, [])).toBe("");
  });
});

describe("sliceCallables", () => {
  it("contains only the requested callable", async () => {
    expect(await sliceCallables(CALC_SOURCE, ["subtract"])).toBe("def subtract(a, b):\n    return a - b");
  });

  it("follows the order of the requested names", async () => {
    expect(await sliceCallables(CALC_SOURCE, ["subtract", "add"])).toBe(
      "def subtract(a, b):\n    return a - b\n\ndef add(a, b):\n    return a + b"
    );
  });

  it("skips names that no longer exist", async () => {
    expect(await sliceCallables(CALC_SOURCE, ["multiply"])).toBe("");
  });

  it("includes every callable sharing a requested name", async () => {
    const source = [
      "class A:",
      "    def run(self):",
      "        return 1",
      "",
      "class B:",
      "    def run(self):",
      "        return 2",
      "",
    ].join("\n");

    expect(await sliceCallables(source, ["run", "run"])).toBe(
      "    def run(self):\n        return 1\n\n    def run(self):\n        return 2"
    );
  });

  it("does not include decorators", async () => {
    expect(await sliceCallables(CLASS_SOURCE, ["describe"])).toBe('    def describe():\n        return "calc"');
  });
});
