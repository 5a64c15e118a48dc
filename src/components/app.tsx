import React, { useState, useEffect, useRef, useCallback, useMemo } from "react";
import { MoireCanvas } from "./moire-canvas";
import { LayerControls } from "./layer-controls";
import type { SystemMode } from "../simulation/compositor";
import { buildLayerStack, LayerPreset, PanelLayer, presetLayers } from "../simulation/layer-presets";
import { clampToRange, RENDER_MODES, RenderMode } from "../simulation/render-modes";
import { formatTitle, RenderRequest } from "../simulation/moire";
import { EXPORT_FILE_NAME, GRAPHENE_LATTICE_CONSTANT } from "../constants";
import type { ImageExporter, RendererMetrics } from "../types/renderer-types";

import "./app.scss";

const SYSTEM_MODE_LABELS: Record<SystemMode, string> = {
  bilayer: "Bilayer",
  trilayer: "Trilayer",
};

const RENDER_MODE_LABELS: Record<RenderMode, string> = {
  "quick": "Quick Mode",
  "high-res": "High-Res Mode",
};

const PRESET_LABELS: Record<LayerPreset, string> = {
  strained: "Strained layers",
  relaxed: "Relaxed twist",
};

/** True when `value` is one of the keys of `labels`. */
function isOption<K extends string>(labels: Record<K, string>, value: string): value is K {
  return Object.prototype.hasOwnProperty.call(labels, value);
}

export const App = () => {
  const [systemMode, setSystemMode] = useState<SystemMode>("bilayer");
  const [renderMode, setRenderMode] = useState<RenderMode>("quick");
  const [preset, setPreset] = useState<LayerPreset>("strained");
  const [extent, setExtent] = useState(RENDER_MODES.quick.defaultExtent);
  const [gridSize, setGridSize] = useState(RENDER_MODES.quick.defaultGridSize);
  const [layers, setLayers] = useState<PanelLayer[]>(() => presetLayers("strained", "bilayer"));
  const [metrics, setMetrics] = useState<RendererMetrics | null>(null);

  const headerRef = useRef<HTMLDivElement>(null);
  const controlsRef = useRef<HTMLDivElement>(null);
  const exportRef = useRef<ImageExporter | null>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const headerHeight = headerRef.current?.offsetHeight ?? 0;
    const controlsWidth = controlsRef.current?.offsetWidth ?? 0;
    setCanvasSize({
      width: window.innerWidth - controlsWidth,
      height: window.innerHeight - headerHeight,
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  const modeSettings = RENDER_MODES[renderMode];

  // Switching system or preset starts over from that preset's layer values.
  const changeSystemMode = (mode: SystemMode) => {
    setSystemMode(mode);
    setLayers(presetLayers(preset, mode));
  };

  const changePreset = (next: LayerPreset) => {
    setPreset(next);
    setLayers(presetLayers(next, systemMode));
  };

  const changeRenderMode = (mode: RenderMode) => {
    setRenderMode(mode);
    setExtent(RENDER_MODES[mode].defaultExtent);
    setGridSize(RENDER_MODES[mode].defaultGridSize);
  };

  const updateLayer = useCallback((index: number, patch: Partial<PanelLayer>) => {
    setLayers(prev => prev.map((layer, i) => (i === index ? { ...layer, ...patch } : layer)));
  }, []);

  const stack = useMemo(() => buildLayerStack(systemMode, layers), [systemMode, layers]);
  const request = useMemo<RenderRequest>(() => ({
    extent,
    gridSize,
    stack,
    latticeConstant: GRAPHENE_LATTICE_CONSTANT,
  }), [extent, gridSize, stack]);
  const title = formatTitle(stack);

  const handleDownload = () => {
    const exportImage = exportRef.current;
    if (!exportImage) return;
    exportImage()
      .then((url) => {
        const link = document.createElement("a");
        link.href = url;
        link.download = EXPORT_FILE_NAME;
        link.click();
      })
      .catch((err) => {
        console.error("Failed to export image:", err);
      });
  };

  // Build performance metrics string
  const perfParts: string[] = [];
  if (metrics) {
    perfParts.push(`${gridSize}×${gridSize} px`);
    perfParts.push(`compute ${metrics.computeTimeMs.toFixed(1)}ms`);
    perfParts.push(`draw ${metrics.sceneUpdateTimeMs.toFixed(1)}ms`);
    perfParts.push(`intensity ${metrics.fieldMin.toFixed(2)} to ${metrics.fieldMax.toFixed(2)}`);
  }

  return (
    <div className="app">
      <div className="header" ref={headerRef}>
        <h1>Twisted Graphene Simulator</h1>
        <p>Toggle between bilayer and trilayer graphene, with Quick and High-Res modes.</p>
      </div>
      <div className="workspace">
        <div className="controls" ref={controlsRef}>
          <label>
            System:
            <select aria-label="Graphene system" value={systemMode}
              onChange={e => { if (isOption(SYSTEM_MODE_LABELS, e.target.value)) changeSystemMode(e.target.value); }}>
              {Object.entries(SYSTEM_MODE_LABELS).map(([value, label]) =>
                <option key={value} value={value}>{label}</option>)}
            </select>
          </label>
          <label>
            Mode:
            <select aria-label="Render mode" value={renderMode}
              onChange={e => { if (isOption(RENDER_MODE_LABELS, e.target.value)) changeRenderMode(e.target.value); }}>
              {Object.entries(RENDER_MODE_LABELS).map(([value, label]) =>
                <option key={value} value={value}>{label}</option>)}
            </select>
          </label>
          {renderMode === "quick"
            ? <div className="mode-note info">Quick Mode: fast interactive preview</div>
            : <div className="mode-note warning">High-Res Mode: may take time to render!</div>}
          <label>
            Scan area: {extent} &Aring;
            <input type="range" min={modeSettings.extent.min} max={modeSettings.extent.max}
              step={modeSettings.extent.step} value={extent}
              onChange={e => setExtent(clampToRange(Number(e.target.value), modeSettings.extent))} />
          </label>
          <label>
            Resolution: {gridSize} px
            <input type="range" min={modeSettings.gridSize.min} max={modeSettings.gridSize.max}
              step={modeSettings.gridSize.step} value={gridSize}
              onChange={e => setGridSize(clampToRange(Number(e.target.value), modeSettings.gridSize))} />
          </label>
          <label>
            Preset:
            <select aria-label="Layer preset" value={preset}
              onChange={e => { if (isOption(PRESET_LABELS, e.target.value)) changePreset(e.target.value); }}>
              {Object.entries(PRESET_LABELS).map(([value, label]) =>
                <option key={value} value={value}>{label}</option>)}
            </select>
          </label>
          {layers.map((layer, i) => (
            <LayerControls key={i} index={i} layer={layer} onChange={updateLayer} />
          ))}
          {renderMode === "high-res" && (
            <button onClick={handleDownload}>Download Image</button>
          )}
        </div>
        <div className="canvas-container">
          <h2 className="field-title">{title}</h2>
          <MoireCanvas
            width={canvasSize.width}
            height={canvasSize.height}
            request={request}
            exportRef={exportRef}
            onMetrics={setMetrics}
          />
          {/* Legend overlay */}
          <div className="legend-overlay">
            {perfParts.length > 0 && <div>{perfParts.join(" | ")}</div>}
          </div>
        </div>
      </div>
    </div>
  );
};
