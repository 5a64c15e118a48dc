import type { Coordinates, Field, Grid } from "../types/grid-types";
import { applyStrain, StrainSpec } from "./strain";
import { rotate } from "./rotation";
import { evaluateLattice } from "./lattice";

export type SystemMode = "bilayer" | "trilayer";

export interface LayerSpec {
  strain: StrainSpec;
  twistDeg: number;  // relative to the reference layer; always 0 for layer 1
}

/**
 * Ordered layers for one render. Layer 1 is the reference lattice orientation;
 * the tuple length is fixed by the mode.
 */
export type LayerStack =
  | { mode: "bilayer"; layers: readonly [LayerSpec, LayerSpec] }
  | { mode: "trilayer"; layers: readonly [LayerSpec, LayerSpec, LayerSpec] };

/** Number of layers each system mode stacks. */
export const LAYER_COUNT: Record<SystemMode, number> = {
  bilayer: 2,
  trilayer: 3,
};

/** Strains the grid for one layer, then twists it if the layer carries a twist. */
export function layerCoordinates(grid: Coordinates, layer: LayerSpec): Coordinates {
  const strained = applyStrain(grid, layer.strain.percent, layer.strain.angleDeg);
  return layer.twistDeg !== 0 ? rotate(strained, layer.twistDeg) : strained;
}

/**
 * Sums the lattice fields of every layer in the stack.
 *
 * Layers are folded into the running sum one at a time, so at most one
 * per-layer field is alive at once.
 */
export function composeLayers(grid: Grid, stack: LayerStack, a: number): Field {
  const { rows, cols } = grid;
  const combined = new Float64Array(rows * cols);

  for (const layer of stack.layers) {
    const { values } = evaluateLattice(layerCoordinates(grid, layer), a);
    for (let i = 0; i < combined.length; i++) {
      combined[i] += values[i];
    }
  }

  return { rows, cols, values: combined };
}
