import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@arithmos/triangle",
    globals: true,
    environment: "node",
  },
});
