import { FormatError } from "./errors.js";
import { addPrimitive, createScene } from "./scene.js";
import type { Coord, PrimitiveKind, Scene } from "./types.js";

const TAGS: Record<string, PrimitiveKind> = {
  POINT: "point",
  LINE: "line",
  POLYGON: "polygon",
};

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface ParsedRecord {
  kind: PrimitiveKind;
  coords: Coord[];
}

export interface LenientParseResult {
  scene: Scene;
  issues: FormatError[];
}

export interface SerializeOptions {
  // round coordinates to this many decimals; omitted keeps the shortest round-trip form
  precision?: number;
}

function classifyUntagged(count: number): PrimitiveKind | null {
  if (count === 2) return "point";
  if (count === 4) return "line";
  if (count >= 6 && count % 2 === 0) return "polygon";
  return null;
}

function checkPairCount(kind: PrimitiveKind, pairs: number): string | null {
  if (kind === "point" && pairs !== 1) return "POINT takes exactly one coordinate pair";
  if (kind === "line" && pairs < 2) return "LINE takes at least two coordinate pairs";
  if (kind === "polygon" && pairs < 3) return "POLYGON takes at least three coordinate pairs";
  return null;
}

/**
 * Parse one non-blank, non-comment line. Returns null for lines that carry no record.
 * `lineNo` is only used for error reporting.
 */
export function parseRecord(raw: string, lineNo: number): ParsedRecord | null {
  const content = raw.trim();
  if (content === "" || content.startsWith("#")) return null;
  const tokens = content.split(/\s+/);

  let kind: PrimitiveKind | null = null;
  let numeric = tokens;
  const head = tokens[0];
  if (/^[a-zA-Z]/.test(head)) {
    const tagged = TAGS[head.toUpperCase()];
    if (!tagged) throw new FormatError(lineNo, content, `unknown record tag ${head}`);
    kind = tagged;
    numeric = tokens.slice(1);
  }

  const values: number[] = [];
  for (const token of numeric) {
    if (!NUMBER_RE.test(token)) throw new FormatError(lineNo, content, `invalid coordinate ${token}`);
    const value = Number(token);
    if (!Number.isFinite(value)) throw new FormatError(lineNo, content, `coordinate out of range ${token}`);
    values.push(value);
  }
  if (values.length % 2 !== 0) {
    throw new FormatError(lineNo, content, `odd number of coordinates (${values.length})`);
  }

  if (kind === null) {
    kind = classifyUntagged(values.length);
    if (kind === null) throw new FormatError(lineNo, content, `cannot infer a primitive from ${values.length} numbers`);
  } else {
    const problem = checkPairCount(kind, values.length / 2);
    if (problem) throw new FormatError(lineNo, content, problem);
  }

  const coords: Coord[] = [];
  for (let i = 0; i < values.length; i += 2) coords.push([values[i], values[i + 1]]);
  return { kind, coords };
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** Strict parse: the first malformed line aborts with a FormatError. */
export function parse(text: string): Scene {
  let scene = createScene();
  splitLines(text).forEach((raw, idx) => {
    const record = parseRecord(raw, idx + 1);
    if (record) scene = addPrimitive(scene, record.kind, record.coords).scene;
  });
  return scene;
}

/** Skip malformed lines and report them instead of aborting. */
export function parseLenient(text: string): LenientParseResult {
  let scene = createScene();
  const issues: FormatError[] = [];
  splitLines(text).forEach((raw, idx) => {
    try {
      const record = parseRecord(raw, idx + 1);
      if (record) scene = addPrimitive(scene, record.kind, record.coords).scene;
    } catch (err) {
      if (!(err instanceof FormatError)) throw err;
      issues.push(err);
    }
  });
  return { scene, issues };
}

export function formatNumber(value: number, precision?: number): string {
  const v = precision === undefined ? value : Number(value.toFixed(precision));
  if (Object.is(v, -0)) return "-0";
  return String(v);
}

export function serialize(scene: Scene, options: SerializeOptions = {}): string {
  return scene.primitives
    .map((p) => {
      const numbers = p.vertices.flatMap((v) => [formatNumber(v[0], options.precision), formatNumber(v[1], options.precision)]);
      return `${p.kind.toUpperCase()} ${numbers.join(" ")}\n`;
    })
    .join("");
}
