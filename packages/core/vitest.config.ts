import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@wary/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
