import { afterEach, describe, expect, it, vi } from "vitest";
import { config, createLogger } from "../index.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("suppresses debug output unless debug is enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("test");

    logger.debug("hidden");
    expect(log).not.toHaveBeenCalled();

    config.set({ debug: true });
    logger.debug("shown", 42);
    expect(log).toHaveBeenCalledWith("[orbis/test] shown", 42);
  });

  it("always writes warnings with the scope prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("shapes").warn("careful");
    expect(warn).toHaveBeenCalledWith("[orbis/shapes] WARN: careful");
  });

  it("always writes errors with the scope prefix", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("shapes").error("broken");
    expect(error).toHaveBeenCalledWith("[orbis/shapes] ERROR: broken");
  });
});
