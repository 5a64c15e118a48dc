import type { Field } from "../types/grid-types";

type ColorStop = [number, number, number, number];

/** Viridis sampled at nine evenly spaced stops: dark purple -> teal -> yellow. */
const VIRIDIS_STOPS: ColorStop[] = [
  [0.000,  68,   1,  84],
  [0.125,  71,  44, 122],
  [0.250,  59,  81, 139],
  [0.375,  44, 113, 142],
  [0.500,  33, 144, 141],
  [0.625,  39, 173, 129],
  [0.750,  92, 200,  99],
  [0.875, 170, 220,  50],
  [1.000, 253, 231,  37],
];

/** Linear interpolation between the two stops surrounding `frac`, as [r, g, b]. */
function interpolateStops(frac: number, stops: ColorStop[]): [number, number, number] {
  let lo = stops[0];
  let hi = stops[stops.length - 1];
  for (let i = 1; i < stops.length; i++) {
    if (frac <= stops[i][0]) {
      lo = stops[i - 1];
      hi = stops[i];
      break;
    }
  }
  const span = hi[0] - lo[0];
  const s = span > 0 ? (frac - lo[0]) / span : 0;
  return [
    Math.round(lo[1] + s * (hi[1] - lo[1])),
    Math.round(lo[2] + s * (hi[2] - lo[2])),
    Math.round(lo[3] + s * (hi[3] - lo[3])),
  ];
}

/** Position of `value` within [min, max], clamped to 0..1. A flat range maps to 0. */
function normalize(value: number, min: number, max: number): number {
  if (!(max > min)) return 0;
  return Math.max(0, Math.min(1, (value - min) / (max - min)));
}

/** Maps an intensity to a 0xRRGGBB color on the viridis scale. */
export function intensityToColor(value: number, min: number, max: number): number {
  const [r, g, b] = interpolateStops(normalize(value, min, max), VIRIDIS_STOPS);
  return r * 65536 + g * 256 + b;
}

/**
 * Converts a field to an RGBA pixel buffer on the viridis scale.
 *
 * The origin is at the lower left: field row 0 (most negative y) becomes the
 * last pixel row.
 */
export function fieldToRGBA(field: Field, min: number, max: number): Uint8Array {
  const { rows, cols, values } = field;
  const pixels = new Uint8Array(rows * cols * 4);
  for (let r = 0; r < rows; r++) {
    const displayRow = rows - 1 - r;
    for (let c = 0; c < cols; c++) {
      const [red, green, blue] = interpolateStops(normalize(values[r * cols + c], min, max), VIRIDIS_STOPS);
      const p = (displayRow * cols + c) * 4;
      pixels[p] = red;
      pixels[p + 1] = green;
      pixels[p + 2] = blue;
      pixels[p + 3] = 255;
    }
  }
  return pixels;
}

/**
 * Converts a field to 8-bit grey levels with the same lower-left origin as
 * fieldToRGBA. Used for headless export.
 */
export function fieldToGray(field: Field, min: number, max: number): Uint8Array {
  const { rows, cols, values } = field;
  const pixels = new Uint8Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    const displayRow = rows - 1 - r;
    for (let c = 0; c < cols; c++) {
      pixels[displayRow * cols + c] = Math.round(255 * normalize(values[r * cols + c], min, max));
    }
  }
  return pixels;
}
