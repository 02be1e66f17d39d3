import { InvalidConfigError } from "./errors.js";

export type EditorConfig = {
  zoomInFactor: number;
  zoomOutFactor: number;
  minZoom: number;
  maxZoom: number;
  gridSize: number; // world units between grid lines
  majorGridEvery: number;
  hitTolerancePx: number;
  pointRadiusPx: number;
  statusTimeoutMs: number;
  fitPadding: number; // fraction of the viewport on each side
};

export const defaultEditorConfig: EditorConfig = {
  zoomInFactor: 1.25,
  zoomOutFactor: 0.8,
  minZoom: 0.05,
  maxZoom: 64,
  gridSize: 20,
  majorGridEvery: 5,
  hitTolerancePx: 6,
  pointRadiusPx: 5,
  statusTimeoutMs: 5000,
  fitPadding: 0.05,
};

export function resolveEditorConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const config: EditorConfig = { ...defaultEditorConfig, ...overrides };
  for (const [key, value] of Object.entries(config)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidConfigError(`Config ${key} must be a non-negative number, got ${value}`);
    }
  }
  if (config.zoomInFactor <= 1) throw new InvalidConfigError("zoomInFactor must be greater than 1");
  if (config.zoomOutFactor <= 0 || config.zoomOutFactor >= 1) {
    throw new InvalidConfigError("zoomOutFactor must be between 0 and 1");
  }
  if (config.minZoom <= 0 || config.minZoom >= config.maxZoom) {
    throw new InvalidConfigError(`minZoom must be positive and below maxZoom (${config.minZoom} / ${config.maxZoom})`);
  }
  if (config.gridSize <= 0) throw new InvalidConfigError("gridSize must be positive");
  if (!Number.isInteger(config.majorGridEvery) || config.majorGridEvery < 1) {
    throw new InvalidConfigError("majorGridEvery must be a positive integer");
  }
  if (config.fitPadding >= 0.5) throw new InvalidConfigError("fitPadding must be below 0.5");
  return config;
}
