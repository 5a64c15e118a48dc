import React, { useRef, useEffect } from "react";
import { createFieldRenderer } from "../rendering/field-renderer";
import type { ImageExporter, Renderer, RendererMetrics } from "../types/renderer-types";
import type { Field } from "../types/grid-types";
import { renderMoire, RenderRequest } from "../simulation/moire";

interface Props {
  width: number;
  height: number;
  request: RenderRequest;
  exportRef?: React.MutableRefObject<ImageExporter | null>;
  onMetrics?: (metrics: RendererMetrics) => void;
}

interface Frame {
  field: Field;
  computeTimeMs: number;
}

export const MoireCanvas: React.FC<Props> = ({ width, height, request, exportRef, onMetrics }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  // Latest computed field; drawn as soon as the renderer is ready.
  const frameRef = useRef<Frame | null>(null);
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onMetricsRef = useRef(onMetrics);
  onMetricsRef.current = onMetrics;
  const exportRefProp = useRef(exportRef);
  exportRefProp.current = exportRef;

  function present(): void {
    const renderer = rendererRef.current;
    const frame = frameRef.current;
    if (!renderer || !frame) return;
    const metrics = renderer.update(frame.field, {
      width: sizeRef.current.width,
      height: sizeRef.current.height,
      computeTimeMs: frame.computeTimeMs,
    });
    onMetricsRef.current?.(metrics);
  }

  // Create the renderer once; destroy on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;

    (async () => {
      const canvas = document.createElement("canvas");
      container.appendChild(canvas);
      const renderer = await createFieldRenderer(canvas, sizeRef.current.width, sizeRef.current.height);

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      if (exportRefProp.current) {
        exportRefProp.current.current = () => renderer.exportImage();
      }
      present();
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      rendererRef.current?.destroy();
      rendererRef.current = null;

      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }

      if (exportRefProp.current) {
        exportRefProp.current.current = null;
      }
    };
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  // Recompute the combined field whenever the request changes.
  useEffect(() => {
    const t0 = performance.now();
    const { field } = renderMoire(request);
    frameRef.current = { field, computeTimeMs: performance.now() - t0 };
    present();
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [request]);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  return <div ref={containerRef} className="moire-canvas" />;
};
