import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lawkit/core",
    globals: true,
    environment: "node",
  },
});
