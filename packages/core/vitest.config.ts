import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@orbis/core",
    globals: true,
    environment: "node",
  },
});
