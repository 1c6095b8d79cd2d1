import { describe, it, expect } from "vitest";

import { diffCoverage, findUntestedCallables } from "@/core/coverage/differ.js";
import type { CallableDescriptor } from "@/core/coverage/types.js";

import { CALC_SOURCE, CALC_TESTS_ADD_ONLY, CALC_TESTS_COMPLETE } from "../../fixtures/python.js";

const ADD: CallableDescriptor = { name: "add", startLine: 4, endLine: 5 };
const SUBTRACT: CallableDescriptor = { name: "subtract", startLine: 8, endLine: 9 };
const RESET: CallableDescriptor = { name: "reset", startLine: 12, endLine: 14, enclosingType: "Calculator" };

describe("diffCoverage", () => {
  it("returns the whole inventory when there is no test document", () => {
    expect(diffCoverage([ADD, SUBTRACT], undefined)).toEqual([ADD, SUBTRACT]);
  });

  it("returns the whole inventory for an empty reference set", () => {
    expect(diffCoverage([ADD, SUBTRACT], new Set())).toEqual([ADD, SUBTRACT]);
  });

  it("removes referenced names", () => {
    expect(diffCoverage([ADD, SUBTRACT], new Set(["add"]))).toEqual([SUBTRACT]);
  });

  it("orders by start line regardless of input order", () => {
    expect(diffCoverage([RESET, SUBTRACT, ADD], new Set())).toEqual([ADD, SUBTRACT, RESET]);
  });

  it("ignores references that name nothing in the inventory", () => {
    expect(diffCoverage([ADD], new Set(["print", "len"]))).toEqual([ADD]);
  });

  it("does not modify its input", () => {
    const inventory = [SUBTRACT, ADD];
    diffCoverage(inventory, undefined);
    expect(inventory).toEqual([SUBTRACT, ADD]);
  });
});

describe("findUntestedCallables", () => {
  it("everything is untested without a test module", async () => {
    expect(await findUntestedCallables(CALC_SOURCE)).toEqual([ADD, SUBTRACT]);
  });

  it("everything is untested against an empty test module", async () => {
    expect(await findUntestedCallables(CALC_SOURCE, "")).toEqual([ADD, SUBTRACT]);
  });

  it("only subtract is untested once add is imported and called", async () => {
    expect(await findUntestedCallables(CALC_SOURCE, CALC_TESTS_ADD_ONLY)).toEqual([SUBTRACT]);
  });

  it("nothing is untested when both are referenced", async () => {
    expect(await findUntestedCallables(CALC_SOURCE, CALC_TESTS_COMPLETE)).toEqual([]);
  });
});
