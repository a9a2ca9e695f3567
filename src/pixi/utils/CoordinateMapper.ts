export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Bounding box of all points with 10% padding on each axis.
 */
export function computeBounds(points: ReadonlyArray<{ x: number; y: number }>): Bounds {
  if (points.length === 0) {
    return { minX: 0, maxX: 1, minY: 0, maxY: 1 };
  }

  let minX = Infinity, maxX = -Infinity;
  let minY = Infinity, maxY = -Infinity;

  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.x > maxX) maxX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }

  const rangeX = maxX - minX || 1;
  const rangeY = maxY - minY || 1;
  const padX = rangeX * 0.1;
  const padY = rangeY * 0.1;

  return {
    minX: minX - padX,
    maxX: maxX + padX,
    minY: minY - padY,
    maxY: maxY + padY,
  };
}

/**
 * Maps game coordinates onto normalized device coordinates (-1..1, y up).
 * The longer side of the bounds spans the whole viewport so the map stays
 * square.
 */
export class CoordinateMapper {
  private size: number;
  private originX: number;
  private originY: number;

  constructor(bounds: Bounds) {
    this.size = Math.max(bounds.maxX - bounds.minX, bounds.maxY - bounds.minY) || 1;
    this.originX = (bounds.minX + bounds.maxX) / 2 - this.size / 2;
    this.originY = (bounds.minY + bounds.maxY) / 2 - this.size / 2;
  }

  static fromPoints(points: ReadonlyArray<{ x: number; y: number }>): CoordinateMapper {
    return new CoordinateMapper(computeBounds(points));
  }

  toNdcX(x: number): number {
    return ((x - this.originX) / this.size) * 2 - 1;
  }

  toNdcY(y: number): number {
    return ((y - this.originY) / this.size) * 2 - 1;
  }
}
