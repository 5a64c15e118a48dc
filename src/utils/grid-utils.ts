import type { Field } from "../types/grid-types";

/** Flat index of sample (r, c) in a row-major array with `cols` columns. */
export function gridIndex(r: number, c: number, cols: number): number {
  return r * cols + c;
}

/** Value of the field at row r, column c. */
export function fieldValue(field: Field, r: number, c: number): number {
  return field.values[gridIndex(r, c, field.cols)];
}

/** Compute the min and max intensity across the field, for color scaling. */
export function fieldRange(field: Field): { min: number; max: number } {
  const { values } = field;
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < values.length; i++) {
    if (values[i] < min) min = values[i];
    if (values[i] > max) max = values[i];
  }
  return { min, max };
}
