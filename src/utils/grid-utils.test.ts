import { fieldRange, fieldValue, gridIndex } from "./grid-utils";
import type { Field } from "../types/grid-types";

describe("gridIndex", () => {
  it("is row-major", () => {
    expect(gridIndex(0, 0, 5)).toBe(0);
    expect(gridIndex(2, 3, 5)).toBe(13);
  });
});

describe("fieldValue", () => {
  it("reads the sample at (row, column)", () => {
    const field: Field = { rows: 2, cols: 3, values: Float64Array.of(1, 2, 3, 4, 5, 6) };
    expect(fieldValue(field, 1, 0)).toBe(4);
    expect(fieldValue(field, 0, 2)).toBe(3);
  });
});

describe("fieldRange", () => {
  it("finds the minimum and maximum intensity", () => {
    const field: Field = { rows: 1, cols: 3, values: Float64Array.of(3, -1, 2) };
    expect(fieldRange(field)).toEqual({ min: -1, max: 3 });
  });
});
