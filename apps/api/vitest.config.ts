import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      reportsDirectory: "./coverage",

      thresholds: {
        lines: 60,
        functions: 60,
        branches: 60,
        statements: 60,
      },

      exclude: [
        "node_modules/**",
        "drizzle/**",
        "**/*.test.ts",
        "**/index.ts",
        "src/server.ts",
        "src/db/**",
        "src/modules/store/drizzle.store.ts",
      ],

      include: ["src/**/*.ts"],
    },
  },
});
