import { type } from "arktype";
import { ConfigurationError } from "../errors";
import {
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_VIEWPORT_CONFIG,
  type LayoutConfig,
  type ViewportConfig,
} from "./types";

// ============================================================================
// Schemas (ArkType)
// ============================================================================

const LayoutConfigSchema = type({
  nodeWidth: "number > 0",
  nodeHeight: "number > 0",
  horizontalGap: "number >= 0",
  spouseGap: "number >= 0",
  levelHeight: "number > 0",
  siblingOffset: "number >= 0",
  originX: "number",
  originY: "number",
});

const ViewportConfigSchema = type({
  minZoom: "number > 0",
  maxZoom: "number > 0",
  initialZoom: "number > 0",
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validates layout overrides on top of {@link DEFAULT_LAYOUT_CONFIG}.
 * Throws ConfigurationError on invalid values.
 */
export function parseLayoutConfig(overrides: unknown = {}): LayoutConfig {
  if (!isRecord(overrides)) {
    throw new ConfigurationError({ message: "Layout configuration must be an object" });
  }

  const result = LayoutConfigSchema({ ...DEFAULT_LAYOUT_CONFIG, ...overrides });
  if (result instanceof type.errors) {
    throw new ConfigurationError({ message: `Invalid layout configuration:\n${result.summary}` });
  }

  if (result.levelHeight <= result.nodeHeight) {
    throw new ConfigurationError({
      message: `levelHeight (${result.levelHeight}) must exceed nodeHeight (${result.nodeHeight})`,
      key: "levelHeight",
    });
  }

  return result;
}

export function parseViewportConfig(overrides: unknown = {}): ViewportConfig {
  if (!isRecord(overrides)) {
    throw new ConfigurationError({ message: "Viewport configuration must be an object" });
  }

  const result = ViewportConfigSchema({ ...DEFAULT_VIEWPORT_CONFIG, ...overrides });
  if (result instanceof type.errors) {
    throw new ConfigurationError({ message: `Invalid viewport configuration:\n${result.summary}` });
  }

  if (result.maxZoom < result.minZoom) {
    throw new ConfigurationError({
      message: `maxZoom (${result.maxZoom}) must not be below minZoom (${result.minZoom})`,
      key: "maxZoom",
    });
  }

  return {
    ...result,
    initialZoom: Math.min(result.maxZoom, Math.max(result.minZoom, result.initialZoom)),
  };
}

/** Smallest center-to-center distance between two nodes on one level */
export function minimumSpacing(config: LayoutConfig): number {
  return config.nodeWidth + Math.min(config.spouseGap, config.horizontalGap);
}
