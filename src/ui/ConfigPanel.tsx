import { PANEL_RANGES } from '../model/config';
import type { SliderRange } from '../model/config';
import type { ClothConfig } from '../model/types';

type ConfigPanelProps = {
  config: ClothConfig;
  onChange: (partial: Partial<ClothConfig>) => void;
  onReset: () => void;
  onPointerOverChange: (over: boolean) => void;
};

type SliderProps = {
  id: string;
  label: string;
  value: number;
  range: SliderRange;
  display?: string;
  onChange: (value: number) => void;
};

function Slider({ id, label, value, range, display, onChange }: SliderProps): JSX.Element {
  return (
    <label className="config-row" htmlFor={id}>
      <span>
        {label} ({display ?? value})
      </span>
      <input
        id={id}
        data-testid={id}
        type="range"
        min={range.min}
        max={range.max}
        step={range.step}
        value={value}
        onChange={(event) => onChange(Number(event.target.value))}
      />
    </label>
  );
}

export function ConfigPanel({
  config,
  onChange,
  onReset,
  onPointerOverChange
}: ConfigPanelProps): JSX.Element {
  return (
    <div
      className="config-panel"
      data-testid="config-panel"
      onPointerEnter={() => onPointerOverChange(true)}
      onPointerLeave={() => onPointerOverChange(false)}
    >
      <h2>Simulation Configurations</h2>
      <p className="config-heading">Cloth Size:</p>
      <Slider
        id="config-width"
        label="Width"
        value={config.width}
        range={PANEL_RANGES.width}
        onChange={(width) => onChange({ width })}
      />
      <Slider
        id="config-height"
        label="Height"
        value={config.height}
        range={PANEL_RANGES.height}
        onChange={(height) => onChange({ height })}
      />
      <Slider
        id="config-cut-radius"
        label="Cut radius"
        value={config.cutRadius}
        range={PANEL_RANGES.cutRadius}
        onChange={(cutRadius) => onChange({ cutRadius })}
      />
      <hr />
      <Slider
        id="config-gravity"
        label="Gravity"
        value={config.gravity.y}
        range={PANEL_RANGES.gravity}
        onChange={(y) => onChange({ gravity: { x: config.gravity.x, y } })}
      />
      <Slider
        id="config-stiffness"
        label="Stiffness"
        value={config.stiffness}
        range={PANEL_RANGES.stiffness}
        display={config.stiffness.toFixed(2)}
        onChange={(stiffness) => onChange({ stiffness })}
      />
      <Slider
        id="config-tear-threshold"
        label="Tear threshold"
        value={config.tearThreshold}
        range={PANEL_RANGES.tearThreshold}
        display={config.tearThreshold.toFixed(1)}
        onChange={(tearThreshold) => onChange({ tearThreshold })}
      />
      <Slider
        id="config-iterations"
        label="Iterations"
        value={config.iterations}
        range={PANEL_RANGES.iterations}
        onChange={(iterations) => onChange({ iterations })}
      />
      <hr />
      <button type="button" data-testid="reset-cloth" onClick={onReset}>
        Reset Cloth
      </button>
    </div>
  );
}
