import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages run from source; their `import` export is the build output.
    alias: {
      "@tweenloom/core": source("core"),
      "@tweenloom/schema": source("schema"),
    },
  },
  test: {
    environment: "node",
    include: [
      "packages/*/tests/**/*.test.ts",
      "packages/*/src/**/*.test.ts",
      "tests/**/*.test.ts",
    ],
  },
});
