import { describe, expect, it } from "vitest";
import { distanceToSegment, hitTestScene, hitTestVertex, pointInRing } from "../src/hitTest.js";
import { addLine, addPoint, addPolygon, createScene, getPrimitive } from "../src/scene.js";
import type { CameraState, Coord } from "../src/types.js";
import { createCameraState } from "../src/view/camera.js";

const camera = createCameraState(800, 600);
const square: Coord[] = [
  [0, 0],
  [100, 0],
  [100, 100],
  [0, 100],
];

describe("hitTestScene", () => {
  it("hits points within the pixel tolerance", () => {
    const { scene, id } = addPoint(createScene(), [10, 10]);
    expect(hitTestScene(scene, camera, [12, 10], 6)).toBe(id);
    expect(hitTestScene(scene, camera, [20, 10], 6)).toBeNull();
  });

  it("prefers the most recently added primitive", () => {
    const polygon = addPolygon(createScene(), square);
    const point = addPoint(polygon.scene, [50, 50]);
    expect(hitTestScene(point.scene, camera, [50, 50], 6)).toBe(point.id);
    expect(hitTestScene(point.scene, camera, [20, 20], 6)).toBe(polygon.id);
  });

  it("hits lines near any segment", () => {
    const { scene, id } = addLine(createScene(), [
      [0, 0],
      [100, 0],
    ]);
    expect(hitTestScene(scene, camera, [50, 4], 6)).toBe(id);
    expect(hitTestScene(scene, camera, [50, 10], 6)).toBeNull();
  });

  it("hits polygon edges from outside, including the closing edge", () => {
    const { scene, id } = addPolygon(createScene(), square);
    expect(hitTestScene(scene, camera, [-3, 50], 6)).toBe(id);
    expect(hitTestScene(scene, camera, [-10, 50], 6)).toBeNull();
  });

  it("keeps the tolerance in screen pixels when zoomed", () => {
    const zoomed: CameraState = { ...camera, zoom: 2 };
    const { scene, id } = addPoint(createScene(), [10, 10]);
    expect(hitTestScene(scene, zoomed, [24, 20], 6)).toBe(id);
    expect(hitTestScene(scene, zoomed, [10, 10], 6)).toBeNull();
  });
});

describe("hitTestVertex", () => {
  it("returns the index of the nearest vertex in range", () => {
    const { scene, id } = addLine(createScene(), [
      [0, 0],
      [100, 0],
    ]);
    const line = getPrimitive(scene, id);
    expect(hitTestVertex(line, camera, [98, 1], 6)).toBe(1);
    expect(hitTestVertex(line, camera, [50, 0], 6)).toBeNull();
  });
});

describe("planar helpers", () => {
  it("measures distance to a segment, clamping to the endpoints", () => {
    expect(distanceToSegment([5, 3], [0, 0], [10, 0])).toBe(3);
    expect(distanceToSegment([13, 4], [0, 0], [10, 0])).toBe(5);
    expect(distanceToSegment([3, 4], [0, 0], [0, 0])).toBe(5);
  });

  it("tests ring containment", () => {
    expect(pointInRing([50, 50], square)).toBe(true);
    expect(pointInRing([150, 50], square)).toBe(false);
  });
});
