import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lawkit/laws",
    globals: true,
    environment: "node",
  },
});
