import { createServerConfig } from "@kinmap/config/vitest";

export default createServerConfig({
  name: "db",
  coverageExclude: ["src/schema/**"],
  testTimeout: 30_000,
});
