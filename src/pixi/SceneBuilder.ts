import { collectUnitPositions, unitsAtFrame } from '../services/unit-tracker';
import type { ProcessedReplay } from '../types/replay.types';
import { concatVertexBuffers } from './geometry/RoundedRectBuilder';
import { MapLayer } from './layers/MapLayer';
import { UnitsLayer } from './layers/UnitsLayer';
import { CoordinateMapper } from './utils/CoordinateMapper';

export type SceneLayer = 'map' | 'units';

/**
 * Composes the vertex buffer the render core draws: background first, units
 * on top. The coordinate mapper is fitted once per replay.
 */
export class SceneBuilder {
  private mapLayer = new MapLayer();
  private unitsLayer = new UnitsLayer();
  private mapper: CoordinateMapper | null = null;
  private replay: ProcessedReplay | null = null;

  build(replay: ProcessedReplay | null, frame: number): Float32Array {
    const background = this.mapLayer.draw();
    if (!replay) return background;

    if (replay !== this.replay || !this.mapper) {
      this.replay = replay;
      this.mapper = CoordinateMapper.fromPoints(collectUnitPositions(replay.trackerEvents));
    }

    const units = unitsAtFrame(replay.trackerEvents, frame);
    return concatVertexBuffers([background, this.unitsLayer.update(units, this.mapper)]);
  }

  setLayerVisibility(layer: SceneLayer, visible: boolean): void {
    switch (layer) {
      case 'map': this.mapLayer.setVisible(visible); break;
      case 'units': this.unitsLayer.setVisible(visible); break;
    }
  }
}
