import type { SceneLayer } from '../../pixi/SceneBuilder';
import { useReplayStore } from '../../state/replayStore';

const LAYER_CONFIG: ReadonlyArray<{ key: SceneLayer; label: string }> = [
  { key: 'map', label: 'Map' },
  { key: 'units', label: 'Units' },
];

export function LayerControls() {
  const layers = useReplayStore((s) => s.layers);
  const toggleLayer = useReplayStore((s) => s.toggleLayer);

  return (
    <div className="layer-controls">
      {LAYER_CONFIG.map(({ key, label }) => (
        <button
          key={key}
          onClick={() => toggleLayer(key)}
          className={layers[key] ? 'layer-controls__button is-active' : 'layer-controls__button'}
        >
          {label}
        </button>
      ))}
    </div>
  );
}
