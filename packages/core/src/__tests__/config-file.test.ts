import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("cosmiconfig", () => ({
  cosmiconfigSync: () => ({
    search: () => ({
      filepath: "/project/.seqflowrc.json",
      config: { uniq: { strategy: "hash" }, split: { empty: "drop" } },
    }),
  }),
}));

import { config } from "../config.js";

afterEach(() => {
  vi.unstubAllEnvs();
  config.reset();
});

describe("config — config file", () => {
  it("loads values from the discovered file", () => {
    expect(config.get("uniq.strategy")).toBe("hash");
    expect(config.get("split.empty")).toBe("drop");
    expect(config.getConfigFilePath()).toBe("/project/.seqflowrc.json");
  });

  it("keeps defaults the file does not mention", () => {
    expect(config.getBoolean("debug", true)).toBe(false);
  });

  it("environment variables override the file", () => {
    vi.stubEnv("SEQFLOW_SPLIT_EMPTY", "keep");
    config.reset();
    expect(config.getChoice("split.empty", ["keep", "drop"], "drop")).toBe("keep");
    expect(config.get("uniq.strategy")).toBe("hash");
  });
});
