import React from "react";
import type { PanelLayer } from "../simulation/layer-presets";
import {
  clampToRange, SliderRange, STRAIN_ANGLE_RANGE, STRAIN_PERCENT_RANGE, TWIST_RANGES,
} from "../simulation/render-modes";

interface Props {
  index: number;
  layer: PanelLayer;
  onChange: (index: number, patch: Partial<PanelLayer>) => void;
}

interface SliderProps {
  range: SliderRange;
  value: number;
  onValue: (value: number) => void;
}

const Slider: React.FC<SliderProps> = ({ range, value, onValue }) => (
  <input type="range" min={range.min} max={range.max} step={range.step} value={value}
    onChange={e => onValue(clampToRange(Number(e.target.value), range))} />
);

/** Strain and twist sliders for one layer. The reference layer (index 0) has no twist. */
export const LayerControls: React.FC<Props> = ({ index, layer, onChange }) => {
  const twistRange = TWIST_RANGES[index] ?? null;
  const layerNumber = index + 1;

  return (
    <fieldset className="layer-controls">
      <legend>Layer {layerNumber}</legend>
      {twistRange && (
        <label>
          Twist angle layer {layerNumber}: {layer.twistDeg.toFixed(1)}&deg;
          <Slider range={twistRange} value={layer.twistDeg}
            onValue={v => onChange(index, { twistDeg: v })} />
        </label>
      )}
      <label>
        Strain: {layer.strainPercent.toFixed(1)}%
        <Slider range={STRAIN_PERCENT_RANGE} value={layer.strainPercent}
          onValue={v => onChange(index, { strainPercent: v })} />
      </label>
      <label>
        Strain direction: {layer.strainAngleDeg.toFixed(0)}&deg;
        <Slider range={STRAIN_ANGLE_RANGE} value={layer.strainAngleDeg}
          onValue={v => onChange(index, { strainAngleDeg: v })} />
      </label>
    </fieldset>
  );
};
