import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@orbis/numeric",
    globals: true,
    environment: "node",
  },
});
