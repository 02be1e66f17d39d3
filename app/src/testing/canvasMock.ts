import type { Canvas2D } from "../canvasRenderer.js";

export type CanvasOp = {
  type: string;
  [key: string]: unknown;
};

/** Records every call so tests can assert what was painted. */
export class MockCanvasContext2D implements Canvas2D {
  ops: CanvasOp[] = [];
  fillStyle: string | CanvasGradient | CanvasPattern = "#000";
  strokeStyle: string | CanvasGradient | CanvasPattern = "#000";
  lineWidth = 1;
  globalAlpha = 1;

  clearRect = (x: number, y: number, width: number, height: number): void => {
    this.ops.push({ type: "clearRect", x, y, width, height });
  };

  save = (): void => {
    this.ops.push({ type: "save" });
  };

  restore = (): void => {
    this.ops.push({ type: "restore" });
  };

  beginPath = (): void => {
    this.ops.push({ type: "beginPath" });
  };

  moveTo = (x: number, y: number): void => {
    this.ops.push({ type: "moveTo", x, y });
  };

  lineTo = (x: number, y: number): void => {
    this.ops.push({ type: "lineTo", x, y });
  };

  closePath = (): void => {
    this.ops.push({ type: "closePath" });
  };

  arc = (x: number, y: number, radius: number, startAngle: number, endAngle: number): void => {
    this.ops.push({ type: "arc", x, y, radius, startAngle, endAngle });
  };

  fill = (): void => {
    this.ops.push({ type: "fill", fillStyle: this.fillStyle, globalAlpha: this.globalAlpha });
  };

  stroke = (): void => {
    this.ops.push({ type: "stroke", strokeStyle: this.strokeStyle, lineWidth: this.lineWidth });
  };
}

const contexts = new WeakMap<HTMLCanvasElement, MockCanvasContext2D>();

export function canvasContext(canvas: HTMLCanvasElement): MockCanvasContext2D | undefined {
  return contexts.get(canvas);
}

/** jsdom has no canvas backend; swap in a recording context with a fixed client rect. */
export function installCanvasMock(width = 800, height = 600): void {
  Object.defineProperty(HTMLCanvasElement.prototype, "getContext", {
    configurable: true,
    writable: true,
    value(this: HTMLCanvasElement, type: string): MockCanvasContext2D | null {
      if (type !== "2d") return null;
      let context = contexts.get(this);
      if (!context) {
        context = new MockCanvasContext2D();
        contexts.set(this, context);
      }
      return context;
    },
  });

  Object.defineProperty(HTMLCanvasElement.prototype, "getBoundingClientRect", {
    configurable: true,
    writable: true,
    value() {
      return {
        x: 0,
        y: 0,
        left: 0,
        top: 0,
        right: width,
        bottom: height,
        width,
        height,
        toJSON() {
          return {};
        },
      };
    },
  });
}
