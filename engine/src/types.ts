export type PrimitiveID = string;

export type Coord = [number, number]; // [x, y], y grows downward

export type PrimitiveKind = "point" | "line" | "polygon";

export interface Primitive {
  id: PrimitiveID;
  kind: PrimitiveKind;
  // polygons are implicitly closed; the closing vertex is never stored
  vertices: readonly Coord[];
}

export interface Scene {
  primitives: readonly Primitive[]; // insertion order
  nextSeq: number;
}

export interface SceneEdit {
  scene: Scene;
  id: PrimitiveID;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface Viewport {
  width: number;
  height: number;
}

export interface CameraState {
  zoom: number;
  panX: number; // world units
  panY: number;
  viewportWidth: number;
  viewportHeight: number;
}

export interface GridLine {
  from: Coord; // screen space
  to: Coord;
  major: boolean;
}

export interface ResolvedStyle {
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  radius?: number;
  opacity?: number;
}

export type PaintTarget = PrimitiveKind | "grid" | "draft" | "handle";

export interface PaintRule {
  target: PaintTarget;
  selected?: boolean; // when set, applies only to (un)selected primitives
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  radius?: number;
  opacity?: number;
}

export interface Measures {
  length: number;
  area: number;
}

// Everything a renderer receives is already in screen coordinates.
export interface SceneRenderer {
  clear(viewport: Viewport): void;
  drawGridLine(line: GridLine, style: ResolvedStyle): void;
  drawPoint(center: Coord, style: ResolvedStyle): void;
  drawLine(points: Coord[], style: ResolvedStyle): void;
  drawPolygon(ring: Coord[], style: ResolvedStyle): void;
  drawHandle(center: Coord, style: ResolvedStyle): void;
}

export interface Draft {
  kind: "line" | "polygon";
  vertices: Coord[];
}
