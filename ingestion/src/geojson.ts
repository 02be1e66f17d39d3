import { feature } from "topojson-client";
import proj4 from "proj4";
import type { FeatureCollection, Geometry } from "geojson";
import type { Topology } from "topojson-specification";
import {
  GisError,
  InvalidGeometryError,
  addPrimitive,
  createScene,
  describeError,
  sceneToFeatureCollection,
  type Coord,
  type PrimitiveKind,
  type PrimitiveProperties,
  type Scene,
  type SerializeOptions,
} from "desk-gis-engine";

export class GeoJSONImportError extends GisError {}

export interface GeoJSONImportOptions {
  // source CRS; overrides a legacy `crs` member on the document
  crs?: string;
  targetCrs?: string;
  // skip invalid features and parts, reporting each as a warning
  lenient?: boolean;
}

export interface GeoJSONImport {
  scene: Scene;
  warnings: string[];
}

type RawObject = Record<string, unknown>;

interface ImportState {
  scene: Scene;
  warnings: string[];
  project: (coord: Coord) => Coord;
  lenient: boolean;
}

const WGS84_NAMES = new Set(["wgs84", "epsg:4326", "urn:ogc:def:crs:ogc:1.3:crs84", "urn:ogc:def:crs:epsg::4326"]);

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTopology(value: unknown): value is Topology {
  return isRecord(value) && value.type === "Topology" && isRecord(value.objects) && Array.isArray(value.arcs);
}

function isWgs84(name: string): boolean {
  return WGS84_NAMES.has(name.toLowerCase());
}

/** The pre-RFC 7946 `crs` member: `{ type: "name", properties: { name } }`. */
function legacyCrsName(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.crs)) return undefined;
  const props = data.crs.properties;
  if (isRecord(props) && typeof props.name === "string") return props.name;
  if (typeof data.crs.name === "string") return data.crs.name;
  return undefined;
}

function buildProjector(source: string | undefined, target: string): (coord: Coord) => Coord {
  if (!source || source === target || (isWgs84(source) && isWgs84(target))) return (coord) => coord;
  try {
    const converter = proj4(source, target);
    return (coord) => {
      const out = converter.forward([coord[0], coord[1]]);
      return [out[0], out[1]];
    };
  } catch (err) {
    throw new GeoJSONImportError(`Cannot reproject from ${source} to ${target}: ${describeError(err)}`, { cause: err });
  }
}

function toCoord(value: unknown, where: string): Coord {
  if (!Array.isArray(value) || value.length < 2) throw new GeoJSONImportError(`${where}: expected a position`);
  const [x, y] = value;
  if (typeof x !== "number" || typeof y !== "number" || !Number.isFinite(x) || !Number.isFinite(y)) {
    throw new GeoJSONImportError(`${where}: position must hold two finite numbers`);
  }
  return [x, y];
}

function toCoords(value: unknown, where: string): Coord[] {
  if (!Array.isArray(value)) throw new GeoJSONImportError(`${where}: expected an array of positions`);
  return value.map((item, idx) => toCoord(item, `${where}[${idx}]`));
}

function toArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) throw new GeoJSONImportError(`${where}: expected an array`);
  return value;
}

function add(state: ImportState, kind: PrimitiveKind, coords: Coord[], where: string): void {
  try {
    state.scene = addPrimitive(state.scene, kind, coords.map(state.project)).scene;
  } catch (err) {
    if (err instanceof InvalidGeometryError) throw new GeoJSONImportError(`${where}: ${err.message}`, { cause: err });
    throw err;
  }
}

function addPolygon(state: ImportState, rings: unknown, where: string): void {
  const list = toArray(rings, where);
  if (list.length === 0) throw new GeoJSONImportError(`${where}: polygon has no rings`);
  const outer = toCoords(list[0], `${where}[0]`);
  const first = outer[0];
  const last = outer[outer.length - 1];
  if (outer.length > 1 && first[0] === last[0] && first[1] === last[1]) outer.pop();
  if (list.length > 1) state.warnings.push(`${where}: ${list.length - 1} hole(s) dropped`);
  add(state, "polygon", outer, where);
}

/** Run `fn` for each item; in lenient mode an import error skips that item only. */
function each(state: ImportState, items: unknown[], where: string, fn: (item: unknown, where: string) => void): void {
  items.forEach((item, i) => {
    const at = `${where}[${i}]`;
    if (!state.lenient) {
      fn(item, at);
      return;
    }
    try {
      fn(item, at);
    } catch (err) {
      if (!(err instanceof GeoJSONImportError)) throw err;
      state.warnings.push(`${err.message} (skipped)`);
    }
  });
}

function collect(state: ImportState, value: unknown, where: string): void {
  if (!isRecord(value)) throw new GeoJSONImportError(`${where}: expected a GeoJSON object`);
  switch (value.type) {
    case "FeatureCollection":
      each(state, toArray(value.features, `${where}.features`), `${where}.features`, (f, at) => collect(state, f, at));
      return;
    case "Feature":
      if (value.geometry === null || value.geometry === undefined) {
        state.warnings.push(`${where}: feature without geometry skipped`);
        return;
      }
      collect(state, value.geometry, `${where}.geometry`);
      return;
    case "GeometryCollection":
      each(state, toArray(value.geometries, `${where}.geometries`), `${where}.geometries`, (g, at) => collect(state, g, at));
      return;
    case "Point":
      add(state, "point", [toCoord(value.coordinates, `${where}.coordinates`)], where);
      return;
    case "MultiPoint":
      each(state, toArray(value.coordinates, `${where}.coordinates`), `${where}.coordinates`, (c, at) =>
        add(state, "point", [toCoord(c, at)], at)
      );
      return;
    case "LineString":
      add(state, "line", toCoords(value.coordinates, `${where}.coordinates`), where);
      return;
    case "MultiLineString":
      each(state, toArray(value.coordinates, `${where}.coordinates`), `${where}.coordinates`, (line, at) =>
        add(state, "line", toCoords(line, at), at)
      );
      return;
    case "Polygon":
      addPolygon(state, value.coordinates, `${where}.coordinates`);
      return;
    case "MultiPolygon":
      each(state, toArray(value.coordinates, `${where}.coordinates`), `${where}.coordinates`, (poly, at) =>
        addPolygon(state, poly, at)
      );
      return;
    case "Topology":
      if (!isTopology(value)) throw new GeoJSONImportError(`${where}: malformed TopoJSON topology`);
      for (const key of Object.keys(value.objects)) {
        collect(state, feature(value, value.objects[key]), `${where}.objects.${key}`);
      }
      return;
    default:
      throw new GeoJSONImportError(`${where}: unsupported GeoJSON type ${String(value.type)}`);
  }
}

/**
 * Build a scene from GeoJSON or TopoJSON. Multi-geometries are split into one
 * primitive per part; polygons keep their outer ring only.
 */
export function sceneFromGeoJSON(data: unknown, options: GeoJSONImportOptions = {}): GeoJSONImport {
  const source = options.crs ?? legacyCrsName(data);
  const state: ImportState = {
    scene: createScene(),
    warnings: [],
    project: buildProjector(source, options.targetCrs ?? "WGS84"),
    lenient: options.lenient ?? false,
  };
  collect(state, data, "$");
  return { scene: state.scene, warnings: state.warnings };
}

function roundScene(scene: Scene, precision: number): Scene {
  const round = (n: number) => Number(n.toFixed(precision));
  return {
    ...scene,
    primitives: scene.primitives.map((p) => ({
      ...p,
      vertices: p.vertices.map(([x, y]): Coord => [round(x), round(y)]),
    })),
  };
}

/** `precision` rounds coordinates to that many decimals, as the text writer does. */
export function sceneToGeoJSON(scene: Scene, options: SerializeOptions = {}): FeatureCollection<Geometry, PrimitiveProperties> {
  return sceneToFeatureCollection(options.precision === undefined ? scene : roundScene(scene, options.precision));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isRecord(value)) {
    return Object.keys(value)
      .sort()
      .reduce((acc: RawObject, key) => {
        acc[key] = sortKeys(value[key]);
        return acc;
      }, {});
  }
  return value;
}

/** Deterministic JSON: sorted keys, two-space indent, trailing newline. */
export function stringifyGeoJSON(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2) + "\n";
}
