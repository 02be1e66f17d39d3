import { readFileSync, writeFileSync } from "fs";
import { extname } from "path";
import {
  GisError,
  describeError,
  parse,
  parseLenient,
  serialize,
  type FormatError,
  type Scene,
  type SerializeOptions,
} from "desk-gis-engine";
import { sceneFromGeoJSON, sceneToGeoJSON, stringifyGeoJSON } from "./geojson.js";

export type SceneFileErrorKind = "read" | "write" | "empty";

export type SceneFileFormat = "text" | "geojson";

export class SceneFileError extends GisError {
  readonly kind: SceneFileErrorKind;
  readonly path: string;

  constructor(kind: SceneFileErrorKind, path: string, cause?: unknown) {
    const message =
      kind === "empty"
        ? `File ${path} is empty`
        : `Cannot ${kind} ${path}: ${describeError(cause)}`;
    super(message, cause === undefined ? undefined : { cause });
    this.kind = kind;
    this.path = path;
  }
}

export interface ReadSceneOptions {
  // skip malformed lines (text) or invalid features (GeoJSON) instead of aborting
  lenient?: boolean;
}

export interface SceneFileContents {
  scene: Scene;
  issues: FormatError[];
  warnings: string[];
}

function readText(path: string): string {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new SceneFileError("read", path, err);
  }
  if (text.trim() === "") throw new SceneFileError("empty", path);
  return text;
}

function writeText(path: string, text: string): void {
  try {
    writeFileSync(path, text, "utf-8");
  } catch (err) {
    throw new SceneFileError("write", path, err);
  }
}

/** Read a text scene file. Parse failures propagate as FormatError unless `lenient`. */
export function readSceneFile(path: string, options: ReadSceneOptions = {}): SceneFileContents {
  const text = readText(path);
  if (options.lenient) {
    const { scene, issues } = parseLenient(text);
    return { scene, issues, warnings: [] };
  }
  return { scene: parse(text), issues: [], warnings: [] };
}

export function writeSceneFile(path: string, scene: Scene, options: SerializeOptions = {}): void {
  writeText(path, serialize(scene, options));
}

export function detectSceneFormat(path: string): SceneFileFormat {
  const ext = extname(path).toLowerCase();
  return ext === ".geojson" || ext === ".json" ? "geojson" : "text";
}

/** Read a scene in either format, chosen by file extension. */
export function loadSceneFromPath(path: string, options: ReadSceneOptions = {}): SceneFileContents {
  if (detectSceneFormat(path) === "text") return readSceneFile(path, options);
  const text = readText(path);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new SceneFileError("read", path, err);
  }
  const { scene, warnings } = sceneFromGeoJSON(data, { lenient: options.lenient });
  return { scene, issues: [], warnings };
}

export function saveSceneToPath(path: string, scene: Scene, options: SerializeOptions = {}): void {
  if (detectSceneFormat(path) === "text") {
    writeSceneFile(path, scene, options);
    return;
  }
  writeText(path, stringifyGeoJSON(sceneToGeoJSON(scene, options)));
}
