import { buildGrid, linspace } from "./grid";
import { gridIndex } from "../utils/grid-utils";

describe("linspace", () => {
  it("spans the full range with evenly spaced samples", () => {
    expect(Array.from(linspace(0, 1, 5))).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it("hits both ends exactly with two samples", () => {
    expect(Array.from(linspace(-10, 10, 2))).toEqual([-10, 10]);
  });
});

describe("buildGrid", () => {
  it("produces axes [-10, 10] for extent 10 and two samples", () => {
    const grid = buildGrid(10, 2);
    expect(grid.rows).toBe(2);
    expect(grid.cols).toBe(2);
    expect(grid.extent).toBe(10);
    // Row-major: x varies along columns, y along rows
    expect(Array.from(grid.x)).toEqual([-10, 10, -10, 10]);
    expect(Array.from(grid.y)).toEqual([-10, -10, 10, 10]);
  });

  it("X and Y have identical shape", () => {
    const grid = buildGrid(50, 400);
    expect(grid.x.length).toBe(400 * 400);
    expect(grid.y.length).toBe(400 * 400);
  });

  it("starts and ends exactly at the extent", () => {
    const grid = buildGrid(50, 400);
    expect(grid.x[0]).toBe(-50);
    expect(grid.x[399]).toBe(50);
    expect(grid.y[0]).toBe(-50);
    expect(grid.y[gridIndex(399, 0, 400)]).toBe(50);
  });

  it("has uniform sample spacing on both axes", () => {
    const grid = buildGrid(50, 401);
    for (let c = 1; c < grid.cols; c++) {
      expect(grid.x[c] - grid.x[c - 1]).toBeCloseTo(0.25, 12);
    }
    for (let r = 1; r < grid.rows; r++) {
      expect(grid.y[gridIndex(r, 0, grid.cols)] - grid.y[gridIndex(r - 1, 0, grid.cols)]).toBeCloseTo(0.25, 12);
    }
  });

  it("keeps y constant along a row and x constant down a column", () => {
    const grid = buildGrid(5, 11);
    for (let r = 0; r < grid.rows; r++) {
      for (let c = 0; c < grid.cols; c++) {
        const i = gridIndex(r, c, grid.cols);
        expect(grid.x[i]).toBe(grid.x[c]);
        expect(grid.y[i]).toBe(grid.y[gridIndex(r, 0, grid.cols)]);
      }
    }
  });

  it("samples the origin at the center of an odd-sized grid", () => {
    const grid = buildGrid(50, 401);
    const center = gridIndex(200, 200, 401);
    expect(grid.x[center]).toBe(0);
    expect(grid.y[center]).toBe(0);
  });

  it("rejects a non-positive extent", () => {
    expect(() => buildGrid(0, 10)).toThrow(RangeError);
    expect(() => buildGrid(-5, 10)).toThrow(RangeError);
    expect(() => buildGrid(NaN, 10)).toThrow(RangeError);
  });

  it("rejects fewer than two samples or a fractional size", () => {
    expect(() => buildGrid(10, 1)).toThrow("Grid size must be an integer of at least 2, got 1");
    expect(() => buildGrid(10, 2.5)).toThrow(RangeError);
  });
});
