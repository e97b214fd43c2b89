import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqflow/core",
    globals: true,
    environment: "node",
  },
});
