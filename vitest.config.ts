import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@server/world": resolve(rootDir, "./src/server/world"),
      "@server/agents": resolve(rootDir, "./src/server/agents"),
      "@clients/cli": resolve(rootDir, "./src/clients/cli"),
      "@shared": resolve(rootDir, "./src/shared"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "tests/",
        "dist/",
        "**/*.config.*",
      ],
    },
  },
});
