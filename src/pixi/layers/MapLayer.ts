import { MAP_CORNER_RADIUS, MAP_TOLERANCE } from '../../config';
import type { RgbaFloat } from '../../types/render.types';
import { buildRoundedRect, uniformRadii } from '../geometry/RoundedRectBuilder';

const BACKGROUND: RgbaFloat = [0, 0, 0, 1];

/**
 * Black rounded background covering the whole viewport.
 */
export class MapLayer {
  private vertices: Float32Array | null = null;
  private visible = true;

  constructor(
    private readonly cornerRadius = MAP_CORNER_RADIUS,
    private readonly tolerance = MAP_TOLERANCE,
  ) {}

  draw(): Float32Array {
    if (!this.visible) return new Float32Array(0);
    // The outline never changes, so it is tessellated once.
    if (!this.vertices) {
      this.vertices = buildRoundedRect(
        { min: [-1, -1], max: [1, 1] },
        uniformRadii(this.cornerRadius),
        BACKGROUND,
        this.tolerance,
      );
    }
    return this.vertices;
  }

  setVisible(v: boolean): void {
    this.visible = v;
  }
}
