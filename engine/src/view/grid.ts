import { defaultEditorConfig, type EditorConfig } from "../config.js";
import type { CameraState, GridLine } from "../types.js";
import { visibleWorldBounds, worldToScreen } from "./camera.js";

const MIN_SPACING_PX = 4;
const MAX_LINES_PER_AXIS = 500;

/**
 * World step actually drawn at the current zoom: the configured grid size,
 * coarsened by `majorGridEvery` until lines are at least a few pixels apart
 * and a viewport `extentPx` wide needs no more than the per-axis line cap.
 */
export function effectiveGridStep(
  zoom: number,
  config: Pick<EditorConfig, "gridSize" | "majorGridEvery"> = defaultEditorConfig,
  extentPx = 0
): number {
  let step = config.gridSize;
  const growth = Math.max(2, config.majorGridEvery);
  while (step * zoom < MIN_SPACING_PX) step *= growth;
  // floor/ceil at both ends can add up to three lines beyond span / step
  const span = extentPx / zoom;
  while (span / step > MAX_LINES_PER_AXIS - 3) step *= growth;
  return step;
}

function axisLines(min: number, max: number, step: number): number[] {
  const out: number[] = [];
  const start = Math.floor(min / step);
  const end = Math.ceil(max / step);
  for (let i = start; i <= end && out.length < MAX_LINES_PER_AXIS; i++) out.push(i);
  return out;
}

/** Grid lines covering the visible area, in screen coordinates. */
export function buildGridLines(
  camera: CameraState,
  config: Pick<EditorConfig, "gridSize" | "majorGridEvery"> = defaultEditorConfig
): GridLine[] {
  const step = effectiveGridStep(camera.zoom, config, Math.max(camera.viewportWidth, camera.viewportHeight));
  const bounds = visibleWorldBounds(camera);
  const majorEvery = Math.max(1, config.majorGridEvery);
  const lines: GridLine[] = [];

  for (const i of axisLines(bounds.minX, bounds.maxX, step)) {
    const [sx] = worldToScreen(camera, [i * step, 0]);
    lines.push({ from: [sx, 0], to: [sx, camera.viewportHeight], major: i % majorEvery === 0 });
  }
  for (const j of axisLines(bounds.minY, bounds.maxY, step)) {
    const [, sy] = worldToScreen(camera, [0, j * step]);
    lines.push({ from: [0, sy], to: [camera.viewportWidth, sy], major: j % majorEvery === 0 });
  }
  return lines;
}
