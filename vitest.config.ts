import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@commitrelay/core": workspace("./packages/core/src/index.ts"),
      "@commitrelay/watcher": workspace("./packages/watcher/src/index.ts"),
      "@commitrelay/notifier": workspace("./packages/notifier/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node",
  },
});
