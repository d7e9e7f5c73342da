import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@arithmos/core",
    globals: true,
    environment: "node",
  },
});
