import { describe, expect, it } from "vitest";

import { addPoint, createCameraState, createScene, FormatError, GisError, parse, serialize, worldToScreen } from "../src/index.js";

describe("package entry exports", () => {
  it("exposes the codec, model and camera from the public entry", () => {
    const scene = addPoint(createScene(), [10, -5]).scene;
    expect(serialize(parse(serialize(scene)))).toBe("POINT 10 -5\n");

    const camera = createCameraState(200, 200);
    expect(worldToScreen(camera, [10, -5])).toEqual([10, -5]);
  });

  it("shares one error base class", () => {
    expect(new FormatError(1, "x", "bad")).toBeInstanceOf(GisError);
    expect(new FormatError(1, "x", "bad").name).toBe("FormatError");
  });
});
