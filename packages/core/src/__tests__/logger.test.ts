import { afterEach, describe, expect, it, vi } from "vitest";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

afterEach(() => {
  vi.restoreAllMocks();
  config.reset();
});

describe("createLogger", () => {
  it("stays quiet at debug level by default", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("test");

    log.debug("hello");

    expect(log.enabled()).toBe(false);
    expect(debug).not.toHaveBeenCalled();
  });

  it("does not build lazy messages while disabled", () => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    const build = vi.fn(() => "expensive");

    createLogger("test").debug(build);

    expect(build).not.toHaveBeenCalled();
  });

  it("prints prefixed debug lines once debug is enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("test");

    config.set({ debug: true });
    log.debug("hello");
    log.debug(() => `built ${1 + 1}`);

    expect(debug).toHaveBeenNthCalledWith(1, "[seqflow:test] hello");
    expect(debug).toHaveBeenNthCalledWith(2, "[seqflow:test] built 2");
  });

  it("always prints warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("test").warn("careful");

    expect(warn).toHaveBeenCalledWith("[seqflow:test] careful");
  });
});
