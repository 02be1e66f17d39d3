import { describe, expect, it } from "vitest";
import { CanvasRenderer } from "./canvasRenderer.js";
import { MockCanvasContext2D } from "./testing/canvasMock.js";

describe("CanvasRenderer", () => {
  it("clears the whole viewport", () => {
    const ctx = new MockCanvasContext2D();
    new CanvasRenderer(ctx).clear({ width: 320, height: 200 });
    expect(ctx.ops).toEqual([{ type: "clearRect", x: 0, y: 0, width: 320, height: 200 }]);
  });

  it("fills and strokes a closed polygon ring", () => {
    const ctx = new MockCanvasContext2D();
    new CanvasRenderer(ctx).drawPolygon(
      [
        [0, 0],
        [10, 0],
        [10, 10],
      ],
      { fill: "#00ff00", stroke: "#008000", strokeWidth: 2, opacity: 0.5 }
    );
    expect(ctx.ops).toEqual([
      { type: "beginPath" },
      { type: "moveTo", x: 0, y: 0 },
      { type: "lineTo", x: 10, y: 0 },
      { type: "lineTo", x: 10, y: 10 },
      { type: "closePath" },
      { type: "save" },
      { type: "fill", fillStyle: "#00ff00", globalAlpha: 0.5 },
      { type: "stroke", strokeStyle: "#008000", lineWidth: 2 },
      { type: "restore" },
    ]);
  });

  it("strokes lines without filling them", () => {
    const ctx = new MockCanvasContext2D();
    new CanvasRenderer(ctx).drawLine(
      [
        [1, 2],
        [3, 4],
      ],
      { fill: "#ffffff", stroke: "#0000ff" }
    );
    expect(ctx.ops.map((op) => op.type)).toEqual(["beginPath", "moveTo", "lineTo", "save", "stroke", "restore"]);
  });

  it("draws points as circles with a default radius", () => {
    const ctx = new MockCanvasContext2D();
    new CanvasRenderer(ctx).drawPoint([7, 8], { fill: "#000000" });
    expect(ctx.ops[1]).toEqual({ type: "arc", x: 7, y: 8, radius: 5, startAngle: 0, endAngle: Math.PI * 2 });
    expect(ctx.ops.filter((op) => op.type === "stroke")).toEqual([]);
  });

  it("skips degenerate shapes", () => {
    const ctx = new MockCanvasContext2D();
    const renderer = new CanvasRenderer(ctx);
    renderer.drawLine([[0, 0]], { stroke: "#000000" });
    renderer.drawPolygon(
      [
        [0, 0],
        [1, 1],
      ],
      { stroke: "#000000" }
    );
    expect(ctx.ops).toEqual([]);
  });
});
