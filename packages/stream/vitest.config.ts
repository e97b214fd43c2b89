import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqflow/stream",
    globals: true,
    environment: "node",
  },
});
