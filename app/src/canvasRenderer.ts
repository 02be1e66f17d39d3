import type { Coord, GridLine, ResolvedStyle, SceneRenderer, Viewport } from "desk-gis-engine";

export type Canvas2D = Pick<
  CanvasRenderingContext2D,
  | "clearRect"
  | "save"
  | "restore"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "closePath"
  | "arc"
  | "fill"
  | "stroke"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "globalAlpha"
>;

const DEFAULT_RADIUS = 5;

/** Paints engine draw calls onto a 2D canvas context. */
export class CanvasRenderer implements SceneRenderer {
  constructor(private readonly ctx: Canvas2D) {}

  clear(viewport: Viewport): void {
    this.ctx.clearRect(0, 0, viewport.width, viewport.height);
  }

  drawGridLine(line: GridLine, style: ResolvedStyle): void {
    this.tracePath([line.from, line.to], false);
    this.paint(style, false);
  }

  drawPoint(center: Coord, style: ResolvedStyle): void {
    this.traceCircle(center, style.radius ?? DEFAULT_RADIUS);
    this.paint(style, true);
  }

  drawLine(points: Coord[], style: ResolvedStyle): void {
    if (points.length < 2) return;
    this.tracePath(points, false);
    this.paint(style, false);
  }

  drawPolygon(ring: Coord[], style: ResolvedStyle): void {
    if (ring.length < 3) return;
    this.tracePath(ring, true);
    this.paint(style, true);
  }

  drawHandle(center: Coord, style: ResolvedStyle): void {
    this.traceCircle(center, style.radius ?? DEFAULT_RADIUS);
    this.paint(style, true);
  }

  private tracePath(points: Coord[], closed: boolean): void {
    const ctx = this.ctx;
    ctx.beginPath();
    points.forEach(([x, y], idx) => {
      if (idx === 0) ctx.moveTo(x, y);
      else ctx.lineTo(x, y);
    });
    if (closed) ctx.closePath();
  }

  private traceCircle([x, y]: Coord, radius: number): void {
    this.ctx.beginPath();
    this.ctx.arc(x, y, radius, 0, Math.PI * 2);
  }

  private paint(style: ResolvedStyle, fillable: boolean): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.globalAlpha = style.opacity ?? 1;
    if (fillable && style.fill) {
      ctx.fillStyle = style.fill;
      ctx.fill();
    }
    if (style.stroke) {
      ctx.strokeStyle = style.stroke;
      ctx.lineWidth = style.strokeWidth ?? 1;
      ctx.stroke();
    }
    ctx.restore();
  }
}
