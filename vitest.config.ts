import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (entry: string) => fileURLToPath(new URL(entry, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages publish compiled output under `dist/`, which is not
    // committed. Tests resolve them to their source entrypoints instead.
    conditions: ["@crawlerverse/source", "import", "module", "default"],
    alias: {
      "@crawlerverse/sdk": source("./packages/crawler-sdk/src/index.ts"),
      "@crawlerverse/agents": source("./packages/crawler-agents/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.{test,spec}.ts"],
    environment: "node",
  },
});
