import { UNIT_TOLERANCE } from '../../config';
import { UNKNOWN_OWNER } from '../../data/unit-palette';
import type { EntityVisual } from '../../types/render.types';
import type { UnitState } from '../../types/replay.types';
import { packedToVertexColor } from '../../utils/ColorUtils';
import { classifyUnit } from '../../utils/unit-classifier';
import { buildRoundedRect, concatVertexBuffers, uniformRadii } from '../geometry/RoundedRectBuilder';
import type { CoordinateMapper } from '../utils/CoordinateMapper';

/**
 * One rounded square per living unit, sized and coloured by its type
 * (or by its owner when the type is unknown).
 */
export class UnitsLayer {
  private visible = true;
  // Classification never changes, so each (type, owner) pair is looked up once.
  private visuals = new Map<string, EntityVisual>();

  constructor(private readonly tolerance = UNIT_TOLERANCE) {}

  update(units: readonly UnitState[], mapper: CoordinateMapper): Float32Array {
    if (!this.visible) return new Float32Array(0);

    const markers: Float32Array[] = [];

    for (const unit of units) {
      if (!unit.alive) continue;

      const owner = unit.userId ?? UNKNOWN_OWNER;
      const key = `${unit.name}\u0000${owner}`;
      let visual = this.visuals.get(key);
      if (!visual) {
        visual = classifyUnit(unit.name, owner);
        this.visuals.set(key, visual);
      }

      const x = mapper.toNdcX(unit.x);
      const y = mapper.toNdcY(unit.y);
      const half = visual.size / 2;
      markers.push(buildRoundedRect(
        { min: [x - half, y - half], max: [x + half, y + half] },
        uniformRadii(visual.size / 4),
        packedToVertexColor(visual.color),
        this.tolerance,
      ));
    }

    return concatVertexBuffers(markers);
  }

  setVisible(v: boolean): void {
    this.visible = v;
  }
}
