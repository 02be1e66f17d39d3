import { geoIdentity, geoPath } from "d3-geo";
import type { Feature, FeatureCollection, Geometry, Position } from "geojson";
import type { Bounds, Coord, Measures, Primitive, PrimitiveKind, Scene } from "./types.js";

export interface PrimitiveProperties {
  id: string;
  kind: PrimitiveKind;
}

// Scene coordinates are planar, so measures go through an identity projection.
const planarPath = geoPath(geoIdentity());

function closeRing(vertices: readonly Coord[]): Position[] {
  const ring: Position[] = vertices.map((v) => [v[0], v[1]]);
  if (ring.length > 0) ring.push([vertices[0][0], vertices[0][1]]);
  return ring;
}

/** GeoJSON geometry for a primitive. Polygon rings come out closed. */
export function primitiveToGeometry(primitive: Primitive): Geometry {
  switch (primitive.kind) {
    case "point": {
      const [x, y] = primitive.vertices[0];
      return { type: "Point", coordinates: [x, y] };
    }
    case "line":
      return { type: "LineString", coordinates: primitive.vertices.map((v) => [v[0], v[1]]) };
    case "polygon":
      return { type: "Polygon", coordinates: [closeRing(primitive.vertices)] };
  }
}

export function primitiveToFeature(primitive: Primitive): Feature<Geometry, PrimitiveProperties> {
  return {
    type: "Feature",
    geometry: primitiveToGeometry(primitive),
    properties: { id: primitive.id, kind: primitive.kind },
  };
}

export function sceneToFeatureCollection(scene: Scene): FeatureCollection<Geometry, PrimitiveProperties> {
  return { type: "FeatureCollection", features: scene.primitives.map(primitiveToFeature) };
}

function toBounds(extent: [[number, number], [number, number]]): Bounds | null {
  const [[minX, minY], [maxX, maxY]] = extent;
  if (![minX, minY, maxX, maxY].every(Number.isFinite)) return null;
  return { minX, minY, maxX, maxY };
}

export function primitiveBounds(primitive: Primitive): Bounds | null {
  return toBounds(planarPath.bounds(primitiveToGeometry(primitive)));
}

/** Planar extent of every primitive, or null for an empty scene. */
export function sceneBounds(scene: Scene): Bounds | null {
  if (scene.primitives.length === 0) return null;
  return toBounds(planarPath.bounds(sceneToFeatureCollection(scene)));
}

/** Line length, polygon perimeter and area. Points measure zero. */
export function measurePrimitive(primitive: Primitive): Measures {
  if (primitive.kind === "point") return { length: 0, area: 0 };
  const geometry = primitiveToGeometry(primitive);
  return {
    length: planarPath.measure(geometry),
    area: primitive.kind === "polygon" ? planarPath.area(geometry) : 0,
  };
}

export function primitiveCentroid(primitive: Primitive): Coord {
  if (primitive.kind === "point") return [primitive.vertices[0][0], primitive.vertices[0][1]];
  const [x, y] = planarPath.centroid(primitiveToGeometry(primitive));
  // collapsed shapes (every vertex coincident) have no centroid of their own
  if (!Number.isFinite(x) || !Number.isFinite(y)) return [primitive.vertices[0][0], primitive.vertices[0][1]];
  return [x, y];
}
