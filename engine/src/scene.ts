import { IndexOutOfRangeError, InvalidGeometryError, NotFoundError } from "./errors.js";
import type { Coord, Primitive, PrimitiveID, PrimitiveKind, Scene, SceneEdit } from "./types.js";

export const MIN_VERTICES: Record<PrimitiveKind, number> = {
  point: 1,
  line: 2,
  polygon: 3,
};

export function createScene(): Scene {
  return { primitives: [], nextSeq: 1 };
}

function assertCoord(coord: Coord, kind: PrimitiveKind): void {
  if (!Number.isFinite(coord[0]) || !Number.isFinite(coord[1])) {
    throw new InvalidGeometryError(`Non-finite coordinate [${coord[0]}, ${coord[1]}] in ${kind}`);
  }
}

/** Append a primitive of any kind. Coordinates are copied, never shared. */
export function addPrimitive(scene: Scene, kind: PrimitiveKind, coords: readonly Coord[]): SceneEdit {
  const min = MIN_VERTICES[kind];
  if (kind === "point" ? coords.length !== 1 : coords.length < min) {
    const expected = kind === "point" ? "exactly 1" : `at least ${min}`;
    throw new InvalidGeometryError(`A ${kind} needs ${expected} vertices, got ${coords.length}`);
  }
  coords.forEach((c) => assertCoord(c, kind));
  const id = `${kind}-${scene.nextSeq}`;
  const primitive: Primitive = {
    id,
    kind,
    vertices: coords.map((c): Coord => [c[0], c[1]]),
  };
  return {
    scene: { primitives: [...scene.primitives, primitive], nextSeq: scene.nextSeq + 1 },
    id,
  };
}

export function addPoint(scene: Scene, coord: Coord): SceneEdit {
  return addPrimitive(scene, "point", [coord]);
}

export function addLine(scene: Scene, coords: readonly Coord[]): SceneEdit {
  return addPrimitive(scene, "line", coords);
}

export function addPolygon(scene: Scene, coords: readonly Coord[]): SceneEdit {
  return addPrimitive(scene, "polygon", coords);
}

export function findPrimitive(scene: Scene, id: PrimitiveID): Primitive | undefined {
  return scene.primitives.find((p) => p.id === id);
}

export function getPrimitive(scene: Scene, id: PrimitiveID): Primitive {
  const found = findPrimitive(scene, id);
  if (!found) throw new NotFoundError(id);
  return found;
}

export function removePrimitive(scene: Scene, id: PrimitiveID): Scene {
  const idx = scene.primitives.findIndex((p) => p.id === id);
  if (idx < 0) throw new NotFoundError(id);
  return {
    ...scene,
    primitives: [...scene.primitives.slice(0, idx), ...scene.primitives.slice(idx + 1)],
  };
}

function replacePrimitive(scene: Scene, next: Primitive): Scene {
  return {
    ...scene,
    primitives: scene.primitives.map((p) => (p.id === next.id ? next : p)),
  };
}

export function movePoint(scene: Scene, primitiveId: PrimitiveID, pointIndex: number, newCoord: Coord): Scene {
  const primitive = getPrimitive(scene, primitiveId);
  if (!Number.isInteger(pointIndex) || pointIndex < 0 || pointIndex >= primitive.vertices.length) {
    throw new IndexOutOfRangeError(pointIndex, primitive.vertices.length);
  }
  assertCoord(newCoord, primitive.kind);
  const vertices = primitive.vertices.map((v, i): Coord => (i === pointIndex ? [newCoord[0], newCoord[1]] : v));
  return replacePrimitive(scene, { ...primitive, vertices });
}

export function translatePrimitive(scene: Scene, id: PrimitiveID, dx: number, dy: number): Scene {
  const primitive = getPrimitive(scene, id);
  const vertices = primitive.vertices.map((v): Coord => [v[0] + dx, v[1] + dy]);
  vertices.forEach((v) => assertCoord(v, primitive.kind));
  return replacePrimitive(scene, { ...primitive, vertices });
}

export function listPrimitives(scene: Scene, kind?: PrimitiveKind): Primitive[] {
  return scene.primitives.filter((p) => kind === undefined || p.kind === kind);
}

export function countByKind(scene: Scene): Record<PrimitiveKind, number> {
  const counts: Record<PrimitiveKind, number> = { point: 0, line: 0, polygon: 0 };
  for (const p of scene.primitives) counts[p.kind] += 1;
  return counts;
}

/** Content equality: kinds and vertices in order. Ids are session handles and are ignored. */
export function sceneEquals(a: Scene, b: Scene): boolean {
  if (a.primitives.length !== b.primitives.length) return false;
  return a.primitives.every((pa, i) => {
    const pb = b.primitives[i];
    if (pa.kind !== pb.kind || pa.vertices.length !== pb.vertices.length) return false;
    return pa.vertices.every((v, j) => Object.is(v[0], pb.vertices[j][0]) && Object.is(v[1], pb.vertices[j][1]));
  });
}
