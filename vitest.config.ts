import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePath = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@config": resolvePath("./src/config"),
      "@models": resolvePath("./src/models"),
      "@services": resolvePath("./src/services"),
      "@utils": resolvePath("./src/utils"),
      "@": resolvePath("./src"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    setupFiles: ["tests/setup.ts"],
    testTimeout: 10000,
  },
});
