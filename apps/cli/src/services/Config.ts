import { Context, Effect, Layer, LogLevel } from "effect";
import { type } from "arktype";
import {
  ConfigurationError,
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_VIEWPORT_CONFIG,
  parseLayoutConfig,
  parseViewportConfig,
  type LayoutConfig,
  type ViewportConfig,
} from "@kinmap/tree-layout";

// ============================================================================
// Configuration Types
// ============================================================================

export type LogLevelName = "debug" | "info" | "warning" | "error";

export interface KinmapConfig {
  readonly dataDir: string;
  readonly logLevel: LogLevel.LogLevel;
  readonly layout: LayoutConfig;
  readonly viewport: ViewportConfig;
}

// ============================================================================
// Configuration Validation (ArkType)
// ============================================================================

// Numbers stay optional so that unset variables fall back to the layout defaults
const RawConfigSchema = type({
  dataDir: "string > 0",
  logLevel: "'debug' | 'info' | 'warning' | 'error'",
  "nodeWidth?": "number",
  "levelHeight?": "number",
  "minZoom?": "number",
  "maxZoom?": "number",
});

type RawConfig = typeof RawConfigSchema.infer;

const LOG_LEVELS: Record<LogLevelName, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
};

type Env = Record<string, string | undefined>;

function numberFrom(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === "" ? undefined : Number(value);
}

/** Drops unset keys so that defaults apply */
function defined(values: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export function readEnv(env: Env): unknown {
  return defined({
    dataDir: env.KINMAP_DATA_DIR ?? "./data/pglite",
    logLevel: env.KINMAP_LOG_LEVEL ?? "info",
    nodeWidth: numberFrom(env.KINMAP_NODE_WIDTH),
    levelHeight: numberFrom(env.KINMAP_LEVEL_HEIGHT),
    minZoom: numberFrom(env.KINMAP_MIN_ZOOM),
    maxZoom: numberFrom(env.KINMAP_MAX_ZOOM),
  });
}

// Parse and validate configuration, throwing ConfigurationError on invalid values
export function parseConfig(raw: unknown): KinmapConfig {
  const result = RawConfigSchema(raw);

  if (result instanceof type.errors) {
    throw new ConfigurationError({ message: `Invalid kinmap configuration:\n${result.summary}` });
  }

  const { dataDir, logLevel, nodeWidth, levelHeight, minZoom, maxZoom }: RawConfig = result;
  return {
    dataDir,
    logLevel: LOG_LEVELS[logLevel],
    layout: parseLayoutConfig(defined({ nodeWidth, levelHeight })),
    viewport: parseViewportConfig(defined({ minZoom, maxZoom })),
  };
}

// ============================================================================
// Configuration Service
// ============================================================================

export class Config extends Context.Tag("Config")<Config, KinmapConfig>() {}

// ============================================================================
// Layer Implementations
// ============================================================================

const loadConfig = (env: Env) =>
  Effect.try({
    try: () => parseConfig(readEnv(env)),
    catch: (error) =>
      error instanceof ConfigurationError ? error : new ConfigurationError({ message: String(error) }),
  });

// Read configuration from environment variables with defaults and validation
export const ConfigLive = Layer.effect(Config, loadConfig(process.env));

// Test configuration with sensible defaults
export const ConfigTest = Layer.succeed(Config, {
  dataDir: "memory://",
  logLevel: LogLevel.Warning,
  layout: DEFAULT_LAYOUT_CONFIG,
  viewport: DEFAULT_VIEWPORT_CONFIG,
});

// Create a custom config layer from an explicit environment
export const makeConfigLayer = (env: Env) => Layer.effect(Config, loadConfig(env));
