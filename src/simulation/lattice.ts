import type { Coordinates, Field } from "../types/grid-types";

const HALF_SQRT3 = Math.sqrt(3) / 2;

/**
 * Hexagonal lattice intensity: three plane waves with wavevectors 120° apart.
 *
 * L(x, y) = cos(2πx/a) + cos(2π(x/2 + √3y/2)/a) + cos(2π(−x/2 + √3y/2)/a)
 *
 * Range [-1.5, 3]; maxima (L = 3) sit on the lattice sites, including the origin.
 */
export function latticeIntensity(x: number, y: number, a: number): number {
  const k = 2 * Math.PI / a;
  return Math.cos(k * x)
    + Math.cos(k * (0.5 * x + HALF_SQRT3 * y))
    + Math.cos(k * (-0.5 * x + HALF_SQRT3 * y));
}

/** Evaluates the lattice intensity at every point of `coords`. */
export function evaluateLattice(coords: Coordinates, a: number): Field {
  const { rows, cols, x, y } = coords;
  const size = x.length;
  const values = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    values[i] = latticeIntensity(x[i], y[i], a);
  }
  return { rows, cols, values };
}
