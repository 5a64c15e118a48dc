import { LAYER_COUNT, LayerSpec, LayerStack, SystemMode } from "./compositor";

/** Control-panel values for one layer. */
export interface PanelLayer {
  strainPercent: number;
  strainAngleDeg: number;
  twistDeg: number;
}

export type LayerPreset = "strained" | "relaxed";

/**
 * Default layer values per preset and system mode.
 *
 * "strained" stretches every layer along a different direction;
 * "relaxed" leaves the twisted layers unstrained, with the bilayer near the
 * 1.1° magic angle.
 */
const PRESETS: Record<LayerPreset, Record<SystemMode, readonly PanelLayer[]>> = {
  strained: {
    bilayer: [
      { strainPercent: 2.0, strainAngleDeg: 0, twistDeg: 0 },
      { strainPercent: 3.0, strainAngleDeg: 30, twistDeg: 1.5 },
    ],
    trilayer: [
      { strainPercent: 2.0, strainAngleDeg: 0, twistDeg: 0 },
      { strainPercent: 3.0, strainAngleDeg: 30, twistDeg: 1.5 },
      { strainPercent: 4.0, strainAngleDeg: 60, twistDeg: -1.5 },
    ],
  },
  relaxed: {
    bilayer: [
      { strainPercent: 2.0, strainAngleDeg: 0, twistDeg: 0 },
      { strainPercent: 0, strainAngleDeg: 0, twistDeg: 1.1 },
    ],
    trilayer: [
      { strainPercent: 2.0, strainAngleDeg: 0, twistDeg: 0 },
      { strainPercent: 0, strainAngleDeg: 0, twistDeg: 4.8 },
      { strainPercent: 0, strainAngleDeg: 0, twistDeg: -1.5 },
    ],
  },
};

/** Returns fresh copies of the preset's layers for the given mode. */
export function presetLayers(preset: LayerPreset, mode: SystemMode): PanelLayer[] {
  return PRESETS[preset][mode].map(layer => ({ ...layer }));
}

function toLayerSpec(panel: PanelLayer, index: number): LayerSpec {
  return {
    strain: { percent: panel.strainPercent, angleDeg: panel.strainAngleDeg },
    twistDeg: index === 0 ? 0 : panel.twistDeg,
  };
}

/**
 * Converts control-panel layers into a layer stack for `mode`.
 * The first layer is the reference, so its twist is forced to 0.
 */
export function buildLayerStack(mode: SystemMode, panel: readonly PanelLayer[]): LayerStack {
  const expected = LAYER_COUNT[mode];
  if (panel.length !== expected) {
    throw new Error(`A ${mode} stack needs ${expected} layers, got ${panel.length}`);
  }

  if (mode === "bilayer") {
    return { mode, layers: [toLayerSpec(panel[0], 0), toLayerSpec(panel[1], 1)] };
  }
  return {
    mode,
    layers: [toLayerSpec(panel[0], 0), toLayerSpec(panel[1], 1), toLayerSpec(panel[2], 2)],
  };
}
