import type { Grid } from "../types/grid-types";

/**
 * `num` (at least 2) evenly spaced samples over [start, stop]. The last sample is set to
 * `stop` exactly so both ends of the range are hit without rounding drift.
 */
export function linspace(start: number, stop: number, num: number): Float64Array {
  const out = new Float64Array(num);
  const step = (stop - start) / (num - 1);
  for (let i = 0; i < num; i++) {
    out[i] = start + i * step;
  }
  out[num - 1] = stop;
  return out;
}

/**
 * Builds the square sampling grid over [-extent, extent] with `gridSize`
 * samples per axis.
 *
 * x[r, c] = xs[c], y[r, c] = ys[r], so image rows follow y and columns follow x.
 */
export function buildGrid(extent: number, gridSize: number): Grid {
  if (!(extent > 0) || !Number.isFinite(extent)) {
    throw new RangeError(`Grid extent must be a positive finite number, got ${extent}`);
  }
  if (!Number.isInteger(gridSize) || gridSize < 2) {
    throw new RangeError(`Grid size must be an integer of at least 2, got ${gridSize}`);
  }

  const axis = linspace(-extent, extent, gridSize);
  const size = gridSize * gridSize;
  const x = new Float64Array(size);
  const y = new Float64Array(size);

  for (let r = 0; r < gridSize; r++) {
    const rowOffset = r * gridSize;
    // Each row is one copy of the x axis at a fixed y.
    x.set(axis, rowOffset);
    y.fill(axis[r], rowOffset, rowOffset + gridSize);
  }

  return { rows: gridSize, cols: gridSize, extent, x, y };
}
