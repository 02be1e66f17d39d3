/**
 * Desk GIS Engine
 * ---------------
 * Scene model, text codec and pan/zoom viewport for a planar GIS editor.
 * No DOM or Node dependencies.
 */
export * from "./types.js";
export {
  GisError,
  FormatError,
  InvalidGeometryError,
  NotFoundError,
  IndexOutOfRangeError,
  InvalidConfigError,
  describeError,
} from "./errors.js";

export { defaultEditorConfig, resolveEditorConfig, type EditorConfig } from "./config.js";

export {
  MIN_VERTICES,
  createScene,
  addPrimitive,
  addPoint,
  addLine,
  addPolygon,
  findPrimitive,
  getPrimitive,
  removePrimitive,
  movePoint,
  translatePrimitive,
  listPrimitives,
  countByKind,
  sceneEquals,
} from "./scene.js";

export {
  parse,
  parseLenient,
  parseRecord,
  serialize,
  formatNumber,
  type LenientParseResult,
  type ParsedRecord,
  type SerializeOptions,
} from "./codec.js";

export {
  createCameraState,
  worldToScreen,
  screenToWorld,
  applyZoom,
  applyWheel,
  applyDrag,
  resizeCamera,
  cameraViewport,
  visibleWorldBounds,
  fitCameraToBounds,
} from "./view/camera.js";

export { buildGridLines, effectiveGridStep } from "./view/grid.js";

export {
  primitiveToGeometry,
  primitiveToFeature,
  sceneToFeatureCollection,
  primitiveBounds,
  sceneBounds,
  measurePrimitive,
  primitiveCentroid,
  type PrimitiveProperties,
} from "./geometry.js";

export { DEFAULT_STYLES, resolveStyle } from "./style.js";

export { renderScene, type RenderOptions } from "./render.js";

export { hitTestScene, hitTestPrimitive, hitTestVertex, distanceToSegment, pointInRing } from "./hitTest.js";
