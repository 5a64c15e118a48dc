import type { Field } from "./grid-types";

export interface RendererOptions {
  width: number;
  height: number;
  computeTimeMs: number;
}

export interface RendererMetrics {
  /** Minimum intensity in the drawn field, mapped to the bottom of the color scale. */
  fieldMin: number;
  /** Maximum intensity in the drawn field, mapped to the top of the color scale. */
  fieldMax: number;
  computeTimeMs: number;
  sceneUpdateTimeMs: number;
}

export interface Renderer {
  update(field: Field, opts: RendererOptions): RendererMetrics;
  resize(width: number, height: number): void;
  /** Encodes the last drawn field at its native resolution as a PNG data URL. */
  exportImage(): Promise<string>;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}

/** Produces a PNG data URL of whatever the canvas currently shows. */
export type ImageExporter = () => Promise<string>;
