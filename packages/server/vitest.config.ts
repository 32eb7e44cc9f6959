import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "tests/**/*.test.ts",
        "**/*.d.ts",
        "**/*.config.*",
        "dist/",
      ],
    },
    include: ["tests/unit/**/*.test.ts", "tests/integration/**/*.test.ts"],
    exclude: ["node_modules/**"],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
