import type { Coordinates } from "../types/grid-types";

/**
 * Rotates coordinates counter-clockwise by `angleDeg`.
 *
 * x' = x·cosθ − y·sinθ
 * y' = x·sinθ + y·cosθ
 */
export function rotate(coords: Coordinates, angleDeg: number): Coordinates {
  const theta = angleDeg * Math.PI / 180;
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  const { rows, cols, x, y } = coords;
  const size = x.length;
  const xs = new Float64Array(size);
  const ys = new Float64Array(size);

  for (let i = 0; i < size; i++) {
    xs[i] = x[i] * cos - y[i] * sin;
    ys[i] = x[i] * sin + y[i] * cos;
  }

  return { rows, cols, x: xs, y: ys };
}
