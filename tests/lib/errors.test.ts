import { describe, it, expect } from "vitest";
import {
  GapfillError,
  ParseError,
  ParserUnavailableError,
  ConfigError,
  GenerationError,
  GitError,
} from "@/lib/errors.js";

describe("Error Classes", () => {
  describe("GapfillError", () => {
    it("should create a basic error", () => {
      const error = new GapfillError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("GapfillError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
    });

    it("should include context when provided", () => {
      const context = { key: "value" };
      const error = new GapfillError("Test message", "TEST_CODE", context);
      expect(error.context).toBe(context);
    });

    it("should serialize to JSON", () => {
      const error = new GapfillError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "GapfillError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ParseError", () => {
    it("should carry file path and line in context", () => {
      const error = new ParseError("Unexpected token", "src/mod.py", 3, { extra: true });
      expect(error.code).toBe("PARSE_ERROR");
      expect(error.name).toBe("ParseError");
      expect(error.filePath).toBe("src/mod.py");
      expect(error.line).toBe(3);
      expect(error.context).toEqual({ extra: true, filePath: "src/mod.py", line: 3 });
    });
  });

  describe("ParserUnavailableError", () => {
    it("should record the missing WASM path", () => {
      const error = new ParserUnavailableError("tree-sitter.wasm not found", "tree-sitter.wasm");
      expect(error).toBeInstanceOf(GapfillError);
      expect(error.code).toBe("PARSER_UNAVAILABLE");
      expect(error.name).toBe("ParserUnavailableError");
      expect(error.context).toEqual({ wasmPath: "tree-sitter.wasm" });
    });

    it("should leave context empty without a path", () => {
      expect(new ParserUnavailableError("init failed").context).toBeUndefined();
    });
  });

  describe("subclasses", () => {
    it.each([
      { error: new ConfigError("c"), name: "ConfigError", code: "CONFIG_ERROR" },
      { error: new GenerationError("g"), name: "GenerationError", code: "GENERATION_ERROR" },
      { error: new GitError("x"), name: "GitError", code: "GIT_ERROR" },
    ])("$name has its name and code", ({ error, name, code }) => {
      expect(error).toBeInstanceOf(GapfillError);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    });
  });
});
