import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config } from "../src/config.js";
import { debug, warn } from "../src/log.js";

describe("log", () => {
  beforeEach(() => {
    process.env.NO_COLOR = "1";
    config.reset();
  });

  afterEach(() => {
    delete process.env.NO_COLOR;
    config.reset();
    vi.restoreAllMocks();
  });

  it("writes debug lines only when debug is on", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    debug("hidden");
    expect(spy).not.toHaveBeenCalled();
    config.set({ debug: true });
    debug("shown");
    expect(spy).toHaveBeenCalledWith("[wary] shown");
  });

  it("prefixes warnings", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    warn("careful");
    expect(warnSpy).toHaveBeenCalledWith("[wary] ⚠ careful");
  });
});
