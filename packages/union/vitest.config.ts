import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@unionerr/union",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
