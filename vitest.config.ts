import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    setupFiles: ["./src/tests/setup.ts"],
    onConsoleLog: () => false,
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/"],
    coverage: {
      provider: "v8",
      reporter: ["json", "json-summary", "html"],
      include: ["src/features/**", "src/lib/**"],
      exclude: [
        "node_modules/",
        "**/*.d.ts",
        "**/*.test.ts",
        "**/*.yaml",
        "**/*.md",
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
    },
  },
});
