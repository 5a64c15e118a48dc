/* eslint-disable no-console */
/**
 * Renders a preset moiré field without a browser and writes it as a binary
 * PGM image, origin at the lower left.
 *
 * Usage: npx tsx scripts/export-field.ts [bilayer|trilayer] [strained|relaxed] > field.pgm
 *
 * Uses the Quick mode scan area and resolution defaults.
 */

import { GRAPHENE_LATTICE_CONSTANT } from "../src/constants";
import type { SystemMode } from "../src/simulation/compositor";
import { buildLayerStack, LayerPreset, presetLayers } from "../src/simulation/layer-presets";
import { RENDER_MODES } from "../src/simulation/render-modes";
import { renderMoire } from "../src/simulation/moire";
import { fieldToGray } from "../src/utils/color-utils";
import { fieldRange } from "../src/utils/grid-utils";

function parseMode(arg: string | undefined): SystemMode {
  if (arg === undefined || arg === "bilayer") return "bilayer";
  if (arg === "trilayer") return "trilayer";
  throw new Error(`Unknown system mode "${arg}", expected bilayer or trilayer`);
}

function parsePreset(arg: string | undefined): LayerPreset {
  if (arg === undefined || arg === "strained") return "strained";
  if (arg === "relaxed") return "relaxed";
  throw new Error(`Unknown preset "${arg}", expected strained or relaxed`);
}

function main(): void {
  const mode = parseMode(process.argv[2]);
  const preset = parsePreset(process.argv[3]);
  const { defaultExtent, defaultGridSize } = RENDER_MODES.quick;

  const t0 = performance.now();
  const { field, title } = renderMoire({
    extent: defaultExtent,
    gridSize: defaultGridSize,
    stack: buildLayerStack(mode, presetLayers(preset, mode)),
    latticeConstant: GRAPHENE_LATTICE_CONSTANT,
  });
  console.error(`${title} (${field.cols}×${field.rows}, ${(performance.now() - t0).toFixed(0)} ms)`);

  const { min, max } = fieldRange(field);
  const header = Buffer.from(`P5\n${field.cols} ${field.rows}\n255\n`, "ascii");
  process.stdout.write(Buffer.concat([header, fieldToGray(field, min, max)]));
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
/* eslint-enable no-console */
