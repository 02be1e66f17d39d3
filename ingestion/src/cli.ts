import {
  countByKind,
  describeError,
  formatNumber,
  measurePrimitive,
  sceneBounds,
  type Scene,
} from "desk-gis-engine";
import { loadSceneFromPath, saveSceneToPath } from "./sceneFile.js";

export interface CliIO {
  log: (line: string) => void;
  error: (line: string) => void;
}

const USAGE = [
  "usage: desk-gis info <file> [--lenient]",
  "       desk-gis convert <input> <output> [--lenient] [--precision N]",
  "Text scene files end in .txt; .geojson and .json are read and written as GeoJSON.",
].join("\n");

const consoleIO: CliIO = {
  // eslint-disable-next-line no-console
  log: (line) => console.log(line),
  // eslint-disable-next-line no-console
  error: (line) => console.error(line),
};

interface ParsedArgs {
  positional: string[];
  lenient: boolean;
  precision?: number;
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positional: [], lenient: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--lenient") {
      parsed.lenient = true;
    } else if (arg === "--precision") {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value < 0 || value > 20) throw new Error("--precision takes an integer between 0 and 20");
      parsed.precision = value;
    } else {
      parsed.positional.push(arg);
    }
  }
  return parsed;
}

const fmt = (n: number) => formatNumber(n, 3);

function describeScene(path: string, scene: Scene, io: CliIO): void {
  const counts = countByKind(scene);
  io.log(
    `${path}: ${scene.primitives.length} primitives (${counts.point} points, ${counts.line} lines, ${counts.polygon} polygons)`
  );
  const bounds = sceneBounds(scene);
  io.log(bounds ? `bounds: ${fmt(bounds.minX)} ${fmt(bounds.minY)} ${fmt(bounds.maxX)} ${fmt(bounds.maxY)}` : "bounds: empty");
  for (const p of scene.primitives) {
    const { length, area } = measurePrimitive(p);
    io.log(`${p.id} ${p.kind} vertices=${p.vertices.length} length=${fmt(length)} area=${fmt(area)}`);
  }
}

/** Run one command; returns the process exit code. */
export function runCli(argv: string[], io: CliIO = consoleIO): number {
  try {
    const [command, ...rest] = argv;
    const args = parseArgs(rest);
    if (command === "info" && args.positional.length === 1) {
      const [path] = args.positional;
      const { scene, issues, warnings } = loadSceneFromPath(path, { lenient: args.lenient });
      issues.forEach((issue) => io.error(`warning: ${issue.message}`));
      warnings.forEach((w) => io.error(`warning: ${w}`));
      describeScene(path, scene, io);
      return 0;
    }
    if (command === "convert" && args.positional.length === 2) {
      const [input, output] = args.positional;
      const { scene, issues, warnings } = loadSceneFromPath(input, { lenient: args.lenient });
      issues.forEach((issue) => io.error(`warning: ${issue.message}`));
      warnings.forEach((w) => io.error(`warning: ${w}`));
      saveSceneToPath(output, scene, { precision: args.precision });
      io.log(`Wrote ${scene.primitives.length} primitives to ${output}`);
      return 0;
    }
    io.error(USAGE);
    return 1;
  } catch (err) {
    io.error(`error: ${describeError(err)}`);
    return 1;
  }
}
