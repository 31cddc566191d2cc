import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@countdown\/errors$/, replacement: workspace("errors") },
      { find: /^@countdown\/core$/, replacement: workspace("core") },
      { find: /^@countdown\/test-utils$/, replacement: workspace("test-utils") },
      { find: /^@countdown\/server$/, replacement: workspace("server") },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
    reporters: process.env.CI ? ["default", "json"] : ["default"],
    outputFile: process.env.CI ? { json: "test-results.json" } : undefined,
  },
});
