import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/tree-layout", "packages/db", "apps/cli"],
  },
});
