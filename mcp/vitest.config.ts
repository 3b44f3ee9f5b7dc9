import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/tools/**", "src/lib/**"],
      exclude: ["src/index.ts", "src/cli.ts"],
    },
  },
});
