import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@orbis/spatial",
    globals: true,
    environment: "node",
  },
});
