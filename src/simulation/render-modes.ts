export type RenderMode = "quick" | "high-res";

export interface SliderRange {
  min: number;
  max: number;
  step: number;
}

export interface RenderModeSettings {
  extent: SliderRange;    // Å
  gridSize: SliderRange;  // samples per axis
  defaultExtent: number;
  defaultGridSize: number;
}

/**
 * Quick mode keeps the grid small enough for interactive dragging;
 * High-Res trades latency for detail and enables image download.
 */
export const RENDER_MODES: Record<RenderMode, RenderModeSettings> = {
  "quick": {
    extent: { min: 10, max: 100, step: 10 },
    gridSize: { min: 200, max: 800, step: 100 },
    defaultExtent: 50,
    defaultGridSize: 400,
  },
  "high-res": {
    extent: { min: 50, max: 500, step: 50 },
    gridSize: { min: 800, max: 3000, step: 100 },
    defaultExtent: 200,
    defaultGridSize: 1500,
  },
};

export const STRAIN_PERCENT_RANGE: SliderRange = { min: 0, max: 10, step: 0.1 };

export const STRAIN_ANGLE_RANGE: SliderRange = { min: 0, max: 180, step: 1 };

export const LAYER_2_TWIST_RANGE: SliderRange = { min: 0, max: 10, step: 0.1 };

export const LAYER_3_TWIST_RANGE: SliderRange = { min: -10, max: 10, step: 0.1 };

/** Twist ranges by layer index. The reference layer (index 0) has no twist control. */
export const TWIST_RANGES: readonly (SliderRange | null)[] = [null, LAYER_2_TWIST_RANGE, LAYER_3_TWIST_RANGE];

function stepDecimals(step: number): number {
  const fraction = String(step).split(".")[1];
  return fraction ? fraction.length : 0;
}

/**
 * Clamps `value` into the range and snaps it to the nearest step counted
 * from `min`. Rounds away the float noise that step arithmetic leaves behind.
 */
export function clampToRange(value: number, range: SliderRange): number {
  const { min, max, step } = range;
  const clamped = Math.max(min, Math.min(max, value));
  const snapped = min + Math.round((clamped - min) / step) * step;
  return Math.min(max, Number(snapped.toFixed(stepDecimals(step))));
}
