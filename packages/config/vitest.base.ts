import { defineConfig, type UserConfig } from "vitest/config";

/**
 * Base vitest configuration shared across all workspaces.
 */
export const baseConfig = {
  include: ["src/**/*.test.ts"],
  passWithNoTests: true,
  coverage: {
    provider: "v8",
    reporter: ["text", "json-summary"],
    reportsDirectory: "coverage",
    exclude: ["src/test/**", "src/**/index.ts"],
  },
} satisfies UserConfig["test"];

export interface CreateConfigOptions {
  /** Workspace name for vitest's test.name */
  name: string;
  /** Additional coverage exclude patterns */
  coverageExclude?: string[];
  /** Per-test timeout; PGLite-backed suites need more than the default 5s */
  testTimeout?: number;
}

/**
 * Create a vitest config for Node.js workspaces.
 */
export function createServerConfig(options: CreateConfigOptions) {
  return defineConfig({
    test: {
      ...baseConfig,
      name: options.name,
      environment: "node",
      testTimeout: options.testTimeout ?? 5_000,
      hookTimeout: Math.max(options.testTimeout ?? 0, 10_000),
      coverage: {
        ...baseConfig.coverage,
        include: ["src/**/*.ts"],
        exclude: [...(baseConfig.coverage?.exclude ?? []), ...(options.coverageExclude ?? [])],
      },
    },
  });
}

export { defineConfig };
