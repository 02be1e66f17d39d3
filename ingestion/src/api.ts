/**
 * File-system entry points for desk-gis scenes. Node only; the engine stays
 * free of I/O so the browser app can share it.
 */
export {
  SceneFileError,
  readSceneFile,
  writeSceneFile,
  detectSceneFormat,
  loadSceneFromPath,
  saveSceneToPath,
  type ReadSceneOptions,
  type SceneFileContents,
  type SceneFileErrorKind,
  type SceneFileFormat,
} from "./sceneFile.js";

export {
  GeoJSONImportError,
  sceneFromGeoJSON,
  sceneToGeoJSON,
  stringifyGeoJSON,
  type GeoJSONImport,
  type GeoJSONImportOptions,
} from "./geojson.js";

export { runCli, type CliIO } from "./cli.js";
