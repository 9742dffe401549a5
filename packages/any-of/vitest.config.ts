import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "any-of",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
