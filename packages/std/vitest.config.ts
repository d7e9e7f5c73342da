import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@arithmos/std",
    globals: true,
    environment: "node",
  },
});
