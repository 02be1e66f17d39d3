import { defaultEditorConfig, type EditorConfig } from "../config.js";
import type { Bounds, CameraState, Coord, Viewport } from "../types.js";

type ZoomLimits = Pick<EditorConfig, "minZoom" | "maxZoom">;
type WheelConfig = Pick<EditorConfig, "minZoom" | "maxZoom" | "zoomInFactor" | "zoomOutFactor">;

export function createCameraState(viewportWidth: number, viewportHeight: number): CameraState {
  return {
    zoom: 1,
    panX: 0,
    panY: 0,
    viewportWidth,
    viewportHeight,
  };
}

// screen = (world + pan) * zoom
export function worldToScreen(camera: CameraState, point: Coord): Coord {
  return [(point[0] + camera.panX) * camera.zoom, (point[1] + camera.panY) * camera.zoom];
}

export function screenToWorld(camera: CameraState, point: Coord): Coord {
  return [point[0] / camera.zoom - camera.panX, point[1] / camera.zoom - camera.panY];
}

function clampZoom(zoom: number, limits: ZoomLimits): number {
  return Math.min(limits.maxZoom, Math.max(limits.minZoom, zoom));
}

/**
 * Multiply zoom by `factor`, keeping the world point under `anchor` fixed on screen.
 * Anchor defaults to the viewport centre.
 */
export function applyZoom(
  camera: CameraState,
  factor: number,
  anchor?: Coord,
  limits: ZoomLimits = defaultEditorConfig
): CameraState {
  if (!(factor > 0) || !Number.isFinite(factor)) return camera;
  const [ax, ay] = anchor ?? [camera.viewportWidth / 2, camera.viewportHeight / 2];
  const zoom = clampZoom(camera.zoom * factor, limits);
  // world under anchor: a / z - pan; solve for the new pan so it stays put
  return {
    ...camera,
    zoom,
    panX: ax / zoom - ax / camera.zoom + camera.panX,
    panY: ay / zoom - ay / camera.zoom + camera.panY,
  };
}

/** `delta` follows WheelEvent.deltaY: negative scrolls away from the user and zooms in. */
export function applyWheel(
  camera: CameraState,
  delta: number,
  cursor: Coord,
  config: WheelConfig = defaultEditorConfig
): CameraState {
  if (delta === 0 || Number.isNaN(delta)) return camera;
  const factor = delta < 0 ? config.zoomInFactor : config.zoomOutFactor;
  return applyZoom(camera, factor, cursor, config);
}

/** Pan by a screen-space delta; the content follows the pointer. */
export function applyDrag(camera: CameraState, delta: Coord): CameraState {
  return {
    ...camera,
    panX: camera.panX + delta[0] / camera.zoom,
    panY: camera.panY + delta[1] / camera.zoom,
  };
}

export function resizeCamera(camera: CameraState, viewport: Viewport): CameraState {
  return { ...camera, viewportWidth: viewport.width, viewportHeight: viewport.height };
}

export function cameraViewport(camera: CameraState): Viewport {
  return { width: camera.viewportWidth, height: camera.viewportHeight };
}

export function visibleWorldBounds(camera: CameraState): Bounds {
  const [minX, minY] = screenToWorld(camera, [0, 0]);
  const [maxX, maxY] = screenToWorld(camera, [camera.viewportWidth, camera.viewportHeight]);
  return { minX, minY, maxX, maxY };
}

/**
 * Zoom and pan so `bounds` fills the viewport, leaving `padding` (fraction of the
 * viewport) on each side. Degenerate extents (a single point) only recentre.
 */
export function fitCameraToBounds(
  camera: CameraState,
  bounds: Bounds,
  padding = defaultEditorConfig.fitPadding,
  limits: ZoomLimits = defaultEditorConfig
): CameraState {
  const width = bounds.maxX - bounds.minX;
  const height = bounds.maxY - bounds.minY;
  const usableW = camera.viewportWidth * (1 - 2 * padding);
  const usableH = camera.viewportHeight * (1 - 2 * padding);
  let zoom = camera.zoom;
  if (width > 0 || height > 0) {
    const zx = width > 0 ? usableW / width : Infinity;
    const zy = height > 0 ? usableH / height : Infinity;
    zoom = clampZoom(Math.min(zx, zy), limits);
  }
  const cx = bounds.minX + width / 2;
  const cy = bounds.minY + height / 2;
  return {
    ...camera,
    zoom,
    panX: camera.viewportWidth / 2 / zoom - cx,
    panY: camera.viewportHeight / 2 / zoom - cy,
  };
}
