import type { Field } from "../types/grid-types";
import { buildGrid } from "./grid";
import { composeLayers, LayerSpec, LayerStack } from "./compositor";

export interface RenderRequest {
  extent: number;          // half-width of the scan area in Å
  gridSize: number;        // samples per axis
  stack: LayerStack;
  latticeConstant: number; // Å
}

export interface MoireResult {
  field: Field;
  title: string;
}

function fmt(value: number): string {
  return value.toFixed(1);
}

/**
 * Human-readable summary of the stack, e.g.
 * "Bilayer Graphene: Twist 1.5°, Strains 2.0% / 3.0%".
 */
export function formatTitle(stack: LayerStack): string {
  const layers: readonly LayerSpec[] = stack.layers;
  const strains = layers.map(l => `${fmt(l.strain.percent)}%`).join(" / ");
  if (stack.mode === "bilayer") {
    return `Bilayer Graphene: Twist ${fmt(stack.layers[1].twistDeg)}°, Strains ${strains}`;
  }
  const [, second, third] = stack.layers;
  return `Trilayer Graphene: Twists ${fmt(second.twistDeg)}° / ${fmt(third.twistDeg)}°, ` +
    `Strains ${strains}`;
}

/** Builds the grid for the request, composes the stack on it and titles the result. */
export function renderMoire(request: RenderRequest): MoireResult {
  const grid = buildGrid(request.extent, request.gridSize);
  const field = composeLayers(grid, request.stack, request.latticeConstant);
  return { field, title: formatTitle(request.stack) };
}
