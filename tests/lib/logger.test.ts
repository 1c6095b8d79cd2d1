import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "@/lib/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("defaults to info", () => {
    const log = new Logger();
    expect(log.getLevel()).toBe("info");
    expect(log.isEnabled("debug")).toBe(false);
    expect(log.isEnabled("info")).toBe(true);
  });

  it("writes to stderr with the prefix", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ prefix: "[test]" });

    log.info("hello");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toBe("[test] hello");
  });

  it("suppresses messages below the level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "warn" });

    log.debug("a");
    log.info("b");
    log.success("c");

    expect(spy).not.toHaveBeenCalled();
  });

  it("silent disables everything", () => {
    const log = new Logger();
    log.configure({ level: "silent" });
    expect(log.isEnabled("error")).toBe(false);
    expect(log.isEnabled("silent")).toBe(false);
  });

  it("children follow the parent's level after creation", () => {
    const parent = new Logger();
    const child = parent.child("[child]");
    expect(child.isEnabled("debug")).toBe(false);

    parent.configure({ level: "debug" });

    expect(child.getLevel()).toBe("debug");
    expect(child.isEnabled("debug")).toBe(true);
  });

  it("children prefix their messages", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const parent = new Logger();
    parent.configure({ prefix: "[app]" });

    parent.child("[mod]").info("ready");

    expect(spy.mock.calls[0]?.[0]).toBe("[app] [mod] ready");
  });
});
