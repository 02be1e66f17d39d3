import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";
import {
  FormatError,
  MIN_VERTICES,
  addPoint,
  addPrimitive,
  applyDrag,
  applyWheel,
  createCameraState,
  createScene,
  describeError,
  findPrimitive,
  fitCameraToBounds,
  formatNumber,
  hitTestScene,
  hitTestVertex,
  measurePrimitive,
  movePoint,
  parse,
  removePrimitive,
  renderScene,
  resizeCamera,
  resolveEditorConfig,
  sceneBounds,
  screenToWorld,
  serialize,
} from "desk-gis-engine";
import type { CameraState, Coord, Draft, EditorConfig, PrimitiveID, Scene } from "desk-gis-engine";
import { CanvasRenderer } from "./canvasRenderer.js";

export type Tool = "select" | "point" | "line" | "polygon";

export interface AppProps {
  initialScene?: Scene;
  config?: Partial<EditorConfig>;
  width?: number;
  height?: number;
  // receives the serialized scene; defaults to a browser download
  onSave?: (text: string, fileName: string) => void;
}

interface DragState {
  mode: "pan" | "vertex";
  start: Coord;
  last: Coord;
  vertexIndex: number;
  moved: boolean;
}

interface StatusMessage {
  text: string;
  seq: number;
}

const DEFAULT_FILE_NAME = "scene.txt";
// pointer travel (px) below which a press counts as a click
const CLICK_SLOP = 3;

const TOOLS: { id: Tool; label: string }[] = [
  { id: "select", label: "Select" },
  { id: "point", label: "Point" },
  { id: "line", label: "Line" },
  { id: "polygon", label: "Polygon" },
];

function downloadText(text: string, fileName: string): void {
  const blob = new Blob([text], { type: "text/plain" });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = fileName;
  anchor.click();
  URL.revokeObjectURL(url);
}

function readFileText(file: File): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => resolve(typeof reader.result === "string" ? reader.result : "");
    reader.onerror = () => reject(reader.error ?? new Error(`Cannot read ${file.name}`));
    reader.readAsText(file);
  });
}

function canvasPoint(canvas: HTMLCanvasElement, clientX: number, clientY: number): Coord {
  const rect = canvas.getBoundingClientRect();
  return [clientX - rect.left, clientY - rect.top];
}

const fmt = (n: number) => formatNumber(n, 2);

const App: React.FC<AppProps> = ({ initialScene, config: overrides, width = 800, height = 600, onSave = downloadText }) => {
  const config = useMemo(() => resolveEditorConfig(overrides), [overrides]);
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const fileInputRef = useRef<HTMLInputElement | null>(null);
  const dragRef = useRef<DragState | null>(null);

  const [scene, setScene] = useState<Scene>(() => initialScene ?? createScene());
  const [camera, setCamera] = useState<CameraState>(() => createCameraState(width, height));
  const [tool, setTool] = useState<Tool>("select");
  const [draftVertices, setDraftVertices] = useState<Coord[]>([]);
  const [selectedId, setSelectedId] = useState<PrimitiveID | null>(null);
  const [fileName, setFileName] = useState<string | null>(null);
  const [cursor, setCursor] = useState<Coord | null>(null);
  const [status, setStatus] = useState<StatusMessage>({ text: "", seq: 0 });

  const showStatus = useCallback((text: string) => {
    setStatus((prev) => ({ text, seq: prev.seq + 1 }));
  }, []);

  useEffect(() => {
    if (!status.text) return undefined;
    const timer = setTimeout(() => setStatus((prev) => (prev.seq === status.seq ? { ...prev, text: "" } : prev)), config.statusTimeoutMs);
    return () => clearTimeout(timer);
  }, [config.statusTimeoutMs, status]);

  useEffect(() => {
    setCamera((cam) => resizeCamera(cam, { width, height }));
  }, [height, width]);

  const draftKind: Draft["kind"] | null = tool === "line" || tool === "polygon" ? tool : null;
  const draft: Draft | null = draftKind ? { kind: draftKind, vertices: draftVertices } : null;
  const canFinish = draftKind !== null && draftVertices.length >= MIN_VERTICES[draftKind];
  const selected = selectedId ? findPrimitive(scene, selectedId) : undefined;

  useEffect(() => {
    const ctx = canvasRef.current?.getContext("2d");
    if (!ctx) return;
    renderScene(scene, camera, new CanvasRenderer(ctx), {
      selectedId,
      draft: draftKind ? { kind: draftKind, vertices: draftVertices } : null,
      config,
    });
  }, [camera, config, draftKind, draftVertices, scene, selectedId]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return undefined;
    // registered natively: React's wheel listener is passive and cannot preventDefault
    const handleWheel = (evt: WheelEvent) => {
      evt.preventDefault();
      const point = canvasPoint(canvas, evt.clientX, evt.clientY);
      setCamera((cam) => applyWheel(cam, evt.deltaY, point, config));
    };
    canvas.addEventListener("wheel", handleWheel, { passive: false });
    return () => canvas.removeEventListener("wheel", handleWheel);
  }, [config]);

  const saveScene = useCallback(() => {
    const name = fileName ?? DEFAULT_FILE_NAME;
    try {
      onSave(serialize(scene), name);
      showStatus(`Saved ${scene.primitives.length} primitives to ${name}.`);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(err);
      showStatus(`Save failed: ${describeError(err)}`);
    }
  }, [fileName, onSave, scene, showStatus]);

  const fitView = useCallback(() => {
    const bounds = sceneBounds(scene);
    if (!bounds) return;
    setCamera((cam) => fitCameraToBounds(cam, bounds, config.fitPadding, config));
  }, [config, scene]);

  const finishDraft = useCallback(() => {
    if (!draftKind || draftVertices.length < MIN_VERTICES[draftKind]) return;
    const edit = addPrimitive(scene, draftKind, draftVertices);
    setScene(edit.scene);
    setSelectedId(edit.id);
    setDraftVertices([]);
    showStatus(`Added ${edit.id}.`);
  }, [draftKind, draftVertices, scene, showStatus]);

  const deleteSelected = useCallback(() => {
    if (!selectedId || !findPrimitive(scene, selectedId)) return;
    setScene(removePrimitive(scene, selectedId));
    setSelectedId(null);
    showStatus(`Deleted ${selectedId}.`);
  }, [scene, selectedId, showStatus]);

  const cancelDraft = useCallback(() => {
    if (draftVertices.length > 0) showStatus("Drawing cancelled.");
    setDraftVertices([]);
    setSelectedId(null);
  }, [draftVertices.length, showStatus]);

  useEffect(() => {
    const handleKeyDown = (evt: KeyboardEvent) => {
      if ((evt.ctrlKey || evt.metaKey) && evt.key.toLowerCase() === "s") {
        evt.preventDefault();
        saveScene();
        return;
      }
      if (evt.target instanceof HTMLInputElement) return;
      if (evt.key === "Delete" || evt.key === "Backspace") deleteSelected();
      else if (evt.key === "Escape") cancelDraft();
      else if (evt.key === "Enter") finishDraft();
    };
    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [cancelDraft, deleteSelected, finishDraft, saveScene]);

  const chooseTool = (next: Tool) => {
    setTool(next);
    setDraftVertices([]);
  };

  const loadText = (text: string, name: string) => {
    if (text.trim() === "") {
      showStatus("File is empty.");
      return;
    }
    try {
      const loaded = parse(text);
      setScene(loaded);
      setSelectedId(null);
      setDraftVertices([]);
      setFileName(name);
      const bounds = sceneBounds(loaded);
      setCamera((cam) => (bounds ? fitCameraToBounds(cam, bounds, config.fitPadding, config) : cam));
      showStatus(`Loaded ${loaded.primitives.length} primitives from ${name}.`);
    } catch (err) {
      if (!(err instanceof FormatError)) {
        // eslint-disable-next-line no-console
        console.error(err);
      }
      showStatus(describeError(err));
    }
  };

  const handleFileChange = (evt: React.ChangeEvent<HTMLInputElement>) => {
    const file = evt.target.files?.[0];
    evt.target.value = "";
    if (!file) return;
    readFileText(file).then(
      (text) => loadText(text, file.name),
      (err: unknown) => {
        // eslint-disable-next-line no-console
        console.error("Scene file read failed", err);
        showStatus(`Cannot read ${file.name}: ${describeError(err)}`);
      }
    );
  };

  const handleClick = (point: Coord) => {
    const world = screenToWorld(camera, point);
    switch (tool) {
      case "select":
        setSelectedId(hitTestScene(scene, camera, point, config.hitTolerancePx));
        return;
      case "point": {
        const edit = addPoint(scene, world);
        setScene(edit.scene);
        showStatus(`Added ${edit.id}.`);
        return;
      }
      case "line":
      case "polygon":
        setDraftVertices((prev) => [...prev, world]);
        return;
    }
  };

  const pointFromEvent = (evt: React.MouseEvent<HTMLCanvasElement>): Coord =>
    canvasPoint(evt.currentTarget, evt.clientX, evt.clientY);

  const handleMouseDown = (evt: React.MouseEvent<HTMLCanvasElement>) => {
    if (evt.button !== 0) return;
    const point = pointFromEvent(evt);
    const vertexIndex =
      tool === "select" && selected ? hitTestVertex(selected, camera, point, config.hitTolerancePx) : null;
    dragRef.current = {
      mode: vertexIndex === null ? "pan" : "vertex",
      start: point,
      last: point,
      vertexIndex: vertexIndex ?? -1,
      moved: false,
    };
  };

  const handleMouseMove = (evt: React.MouseEvent<HTMLCanvasElement>) => {
    const point = pointFromEvent(evt);
    setCursor(screenToWorld(camera, point));
    const drag = dragRef.current;
    if (!drag) return;
    if (!drag.moved && Math.hypot(point[0] - drag.start[0], point[1] - drag.start[1]) <= CLICK_SLOP) return;
    drag.moved = true;
    if (drag.mode === "pan") {
      const delta: Coord = [point[0] - drag.last[0], point[1] - drag.last[1]];
      setCamera((cam) => applyDrag(cam, delta));
    } else if (selectedId) {
      const world = screenToWorld(camera, point);
      setScene((prev) => movePoint(prev, selectedId, drag.vertexIndex, world));
    }
    drag.last = point;
  };

  const handleMouseUp = (evt: React.MouseEvent<HTMLCanvasElement>) => {
    const drag = dragRef.current;
    dragRef.current = null;
    if (!drag || drag.moved) return;
    handleClick(pointFromEvent(evt));
  };

  const measures = selected ? measurePrimitive(selected) : null;

  return (
    <div className="app-shell" style={{ display: "flex", flexDirection: "column", gap: 8 }}>
      <div className="panel toolbar" role="toolbar" style={{ display: "flex", gap: 8 }}>
        <button onClick={() => fileInputRef.current?.click()}>Open</button>
        <input
          ref={fileInputRef}
          type="file"
          accept=".txt,text/plain"
          aria-label="Scene file"
          style={{ display: "none" }}
          onChange={handleFileChange}
        />
        <button onClick={saveScene}>Save</button>
        {TOOLS.map((t) => (
          <button key={t.id} aria-pressed={tool === t.id} onClick={() => chooseTool(t.id)}>
            {t.label}
          </button>
        ))}
        <button onClick={finishDraft} disabled={!canFinish}>
          Finish
        </button>
        <button onClick={deleteSelected} disabled={!selected}>
          Delete
        </button>
        <button onClick={fitView} disabled={scene.primitives.length === 0}>
          Fit
        </button>
      </div>

      <div style={{ display: "flex", gap: 8 }}>
        <canvas
          ref={canvasRef}
          data-testid="scene-canvas"
          width={width}
          height={height}
          onMouseDown={handleMouseDown}
          onMouseMove={handleMouseMove}
          onMouseUp={handleMouseUp}
          onMouseLeave={() => {
            dragRef.current = null;
            setCursor(null);
          }}
        />
        <div className="panel" data-testid="selection" style={{ minWidth: 200 }}>
          <h3>Selection</h3>
          {selected && measures ? (
            <ul className="info-list">
              <li>
                {selected.id} ({selected.kind})
              </li>
              <li>Vertices: {selected.vertices.length}</li>
              {selected.kind !== "point" && <li>Length: {fmt(measures.length)}</li>}
              {selected.kind === "polygon" && <li>Area: {fmt(measures.area)}</li>}
            </ul>
          ) : (
            <p>Nothing selected</p>
          )}
          <p className="status-row">Primitives: {scene.primitives.length}</p>
          {draft && <p className="status-row">Draft vertices: {draft.vertices.length}</p>}
        </div>
      </div>

      <div className="panel status-bar" style={{ display: "flex", gap: 16 }}>
        <span data-testid="status-message" role="status">
          {status.text}
        </span>
        <span data-testid="zoom">Zoom {Math.round(camera.zoom * 100)}%</span>
        <span data-testid="cursor">{cursor ? `${fmt(cursor[0])}, ${fmt(cursor[1])}` : ""}</span>
      </div>
    </div>
  );
};

export default App;
