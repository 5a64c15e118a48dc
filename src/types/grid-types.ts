/**
 * Shape-carrying pair of coordinate arrays, stored row-major.
 * Row index follows y, column index follows x.
 */
export interface Coordinates {
  readonly rows: number;
  readonly cols: number;
  readonly x: Float64Array;
  readonly y: Float64Array;
}

/** Sampling grid spanning [-extent, extent] on both axes. Never written after it is built. */
export interface Grid extends Coordinates {
  readonly extent: number;
}

/** Scalar intensity values with the same shape as the grid they were sampled on. */
export interface Field {
  readonly rows: number;
  readonly cols: number;
  readonly values: Float64Array;
}
