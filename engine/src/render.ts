import { defaultEditorConfig, type EditorConfig } from "./config.js";
import { resolveStyle } from "./style.js";
import type { CameraState, Coord, Draft, PaintRule, PrimitiveID, Scene, SceneRenderer } from "./types.js";
import { cameraViewport, worldToScreen } from "./view/camera.js";
import { buildGridLines } from "./view/grid.js";

export interface RenderOptions {
  selectedId?: PrimitiveID | null;
  draft?: Draft | null;
  rules?: PaintRule[];
  showGrid?: boolean;
  config?: Pick<EditorConfig, "gridSize" | "majorGridEvery" | "pointRadiusPx">;
}

/**
 * Draw grid, then primitives in insertion order, then the draft and the
 * selected primitive's vertex handles on top.
 */
export function renderScene(scene: Scene, camera: CameraState, renderer: SceneRenderer, options: RenderOptions = {}): void {
  const rules = options.rules ?? [];
  const config = options.config ?? defaultEditorConfig;
  const toScreen = (v: Coord) => worldToScreen(camera, v);

  renderer.clear(cameraViewport(camera));

  if (options.showGrid ?? true) {
    const gridStyle = resolveStyle("grid", rules);
    for (const line of buildGridLines(camera, config)) {
      renderer.drawGridLine(line, line.major ? { ...gridStyle, strokeWidth: (gridStyle.strokeWidth ?? 1) * 1.5 } : gridStyle);
    }
  }

  let selectedVertices: Coord[] = [];
  for (const primitive of scene.primitives) {
    const selected = primitive.id === options.selectedId;
    const style = resolveStyle(primitive.kind, rules, selected);
    const points = primitive.vertices.map(toScreen);
    if (selected) selectedVertices = points;
    switch (primitive.kind) {
      case "point":
        renderer.drawPoint(points[0], { ...style, radius: style.radius ?? config.pointRadiusPx });
        break;
      case "line":
        renderer.drawLine(points, style);
        break;
      case "polygon":
        renderer.drawPolygon(points, style);
        break;
    }
  }

  const draft = options.draft;
  if (draft && draft.vertices.length > 0) {
    const draftStyle = resolveStyle("draft", rules);
    const points = draft.vertices.map(toScreen);
    if (draft.kind === "polygon" && points.length >= 3) renderer.drawPolygon(points, draftStyle);
    else if (points.length >= 2) renderer.drawLine(points, draftStyle);
    for (const p of points) renderer.drawHandle(p, draftStyle);
  }

  const handleStyle = resolveStyle("handle", rules);
  for (const p of selectedVertices) renderer.drawHandle(p, handleStyle);
}
