import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@wary/diagnostics",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
