import { createServerConfig } from "@kinmap/config/vitest";

export default createServerConfig({
  name: "cli",
  coverageExclude: ["src/main.ts"],
  testTimeout: 30_000,
});
