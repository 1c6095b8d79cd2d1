import { describe, it, expect } from "vitest";

import { isAIProvider, resolveAIConfig } from "@/ai/config.js";

describe("isAIProvider", () => {
  it("accepts known providers only", () => {
    expect(isAIProvider("gemini")).toBe(true);
    expect(isAIProvider("mock")).toBe(true);
    expect(isAIProvider("llama")).toBe(false);
  });
});

describe("resolveAIConfig", () => {
  it("defaults to anthropic with its default model", () => {
    expect(resolveAIConfig(undefined, {}, {})).toEqual({
      success: true,
      data: { provider: "anthropic", model: "claude-sonnet-4-20250514", temperature: 0.3 },
    });
  });

  it("reads the key from the provider's environment variable", () => {
    const result = resolveAIConfig(undefined, {}, { GAPFILL_PROVIDER: "gemini", GOOGLE_API_KEY: "test-secret" });

    expect(result).toEqual({
      success: true,
      data: { provider: "gemini", model: "gemini-2.0-flash-lite", temperature: 0.3, apiKey: "test-secret" },
    });
  });

  it("prefers flags over the project file over the environment", () => {
    const env = { GAPFILL_PROVIDER: "gemini" };

    const fromSection = resolveAIConfig({ provider: "openai", model: "gpt-4o" }, {}, env);
    expect(fromSection.success && fromSection.data.provider).toBe("openai");
    expect(fromSection.success && fromSection.data.model).toBe("gpt-4o");

    const fromFlag = resolveAIConfig({ provider: "openai" }, { provider: "MOCK", temperature: 0 }, env);
    expect(fromFlag).toEqual({
      success: true,
      data: { provider: "mock", model: "mock-model", temperature: 0 },
    });
  });

  it("keeps max tokens and an explicit key", () => {
    const result = resolveAIConfig({ maxTokens: 2000 }, { apiKey: "test-secret" }, {});
    expect(result.success && result.data).toEqual({
      provider: "anthropic",
      model: "claude-sonnet-4-20250514",
      temperature: 0.3,
      maxTokens: 2000,
      apiKey: "test-secret",
    });
  });

  it("ignores an empty key in the environment", () => {
    const result = resolveAIConfig(undefined, {}, { ANTHROPIC_API_KEY: "" });
    expect(result.success && result.data.apiKey).toBeUndefined();
  });

  it("rejects unknown providers", () => {
    const result = resolveAIConfig(undefined, { provider: "llama" }, {});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("CONFIG_ERROR");
      expect(result.error.message).toBe("Unknown AI provider: llama. Available providers: anthropic, openai, gemini, mock");
    }
  });

  it("rejects out-of-range temperatures and bad token limits", () => {
    expect(resolveAIConfig(undefined, { temperature: 2.5 }, {}).success).toBe(false);
    expect(resolveAIConfig(undefined, { temperature: -0.1 }, {}).success).toBe(false);
    expect(resolveAIConfig(undefined, { maxTokens: 0 }, {}).success).toBe(false);
    expect(resolveAIConfig(undefined, { maxTokens: 1.5 }, {}).success).toBe(false);
  });
});
