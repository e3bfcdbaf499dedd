import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (relativePath: string) => fileURLToPath(new URL(relativePath, import.meta.url));

const aliases = [
  { find: "@gloss/ai-core", replacement: fromRoot("./packages/ai-core/src/index.ts") },
  { find: "@gloss/review-core", replacement: fromRoot("./packages/review-core/src/index.ts") },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
  },
});
