import type { Coordinates } from "../types/grid-types";

export interface StrainSpec {
  percent: number;   // strain magnitude, 0 = unstrained
  angleDeg: number;  // principal stretching direction
}

/** Row-major 2×2 matrix: [m00, m01, m10, m11]. */
export type Matrix2 = readonly [number, number, number, number];

/**
 * Deformation matrix for a uniaxial strain of `percent` along `angleDeg`.
 *
 * ε_xx = f·cos²θ, ε_yy = f·sin²θ, ε_xy = f·sinθ·cosθ (f = percent / 100)
 * M = [[1 + ε_xx, ε_xy], [ε_xy, 1 + ε_yy]]
 */
export function strainMatrix(percent: number, angleDeg: number): Matrix2 {
  const theta = angleDeg * Math.PI / 180;
  const f = percent / 100;
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  const epsXX = f * cos * cos;
  const epsYY = f * sin * sin;
  const epsXY = f * sin * cos;
  return [1 + epsXX, epsXY, epsXY, 1 + epsYY];
}

/** Maps every grid point (x, y) to M·(x, y). Zero strain leaves coordinates unchanged. */
export function applyStrain(coords: Coordinates, percent: number, angleDeg: number): Coordinates {
  const [m00, m01, m10, m11] = strainMatrix(percent, angleDeg);
  const { rows, cols, x, y } = coords;
  const size = x.length;
  const xs = new Float64Array(size);
  const ys = new Float64Array(size);

  for (let i = 0; i < size; i++) {
    xs[i] = m00 * x[i] + m01 * y[i];
    ys[i] = m10 * x[i] + m11 * y[i];
  }

  return { rows, cols, x: xs, y: ys };
}
