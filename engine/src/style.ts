import type { PaintRule, PaintTarget, ResolvedStyle } from "./types.js";

export const DEFAULT_STYLES: Record<PaintTarget, ResolvedStyle> = {
  point: { stroke: "#ff0000", fill: "#000000", strokeWidth: 1, radius: 5 },
  line: { stroke: "#0000ff", strokeWidth: 2 },
  polygon: { stroke: "#00c000", fill: "rgba(0, 255, 0, 0.4)", strokeWidth: 2 },
  grid: { stroke: "#d3d3d3", strokeWidth: 1 },
  draft: { stroke: "#6b7280", fill: "rgba(107, 114, 128, 0.15)", strokeWidth: 1, radius: 3 },
  handle: { stroke: "#f97316", fill: "#ffffff", strokeWidth: 1, radius: 4 },
};

const SELECTED_OVERRIDE: ResolvedStyle = { stroke: "#f97316", strokeWidth: 3 };

/** Resolve paint rules for a target. Defaults first, then selection, then rules; last matching rule wins. */
export function resolveStyle(target: PaintTarget, rules: PaintRule[] = [], selected = false): ResolvedStyle {
  const resolved: ResolvedStyle = { ...DEFAULT_STYLES[target] };
  if (selected) Object.assign(resolved, SELECTED_OVERRIDE);
  for (const rule of rules) {
    if (rule.target !== target) continue;
    if (rule.selected !== undefined && rule.selected !== selected) continue;
    if (rule.fill !== undefined) resolved.fill = rule.fill;
    if (rule.stroke !== undefined) resolved.stroke = rule.stroke;
    if (rule.strokeWidth !== undefined) resolved.strokeWidth = rule.strokeWidth;
    if (rule.radius !== undefined) resolved.radius = rule.radius;
    if (rule.opacity !== undefined) resolved.opacity = rule.opacity;
  }
  return resolved;
}
