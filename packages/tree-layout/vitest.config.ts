import { createServerConfig } from "@kinmap/config/vitest";

export default createServerConfig({ name: "tree-layout" });
