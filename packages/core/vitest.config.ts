import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@unionerr/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
