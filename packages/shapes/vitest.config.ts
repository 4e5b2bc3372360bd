import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@orbis/shapes",
    globals: true,
    environment: "node",
  },
});
