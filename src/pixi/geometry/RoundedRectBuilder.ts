import earcut from 'earcut';
import type { BorderRadii, Box2D, RgbaFloat } from '../../types/render.types';
import { VERTEX_STRIDE } from '../../types/render.types';

type Point = readonly [number, number];

const MIN_TOLERANCE = 1e-4;
const QUARTER_TURN = Math.PI / 2;

// Unit directions at 0, 90, 180 and 270 degrees, so arc endpoints land
// exactly on the rectangle edges.
const AXIS_DIRECTIONS: readonly Point[] = [[1, 0], [0, 1], [-1, 0], [0, -1]];

/**
 * Number of chords needed for a quarter circle of `radius` so that no chord
 * strays further than `tolerance` from the arc.
 */
export function arcSegmentCount(radius: number, tolerance: number): number {
  if (!(radius > 0)) return 0;
  const tol = Math.max(tolerance, MIN_TOLERANCE);
  if (tol >= radius) return 1;
  const maxStep = 2 * Math.acos(1 - tol / radius);
  return Math.max(1, Math.ceil(QUARTER_TURN / maxStep));
}

function clampRadius(radius: number, maxRadius: number): number {
  if (!(radius > 0)) return 0;
  return Math.min(radius, maxRadius);
}

function pushCorner(
  out: Point[],
  cornerX: number,
  cornerY: number,
  centerX: number,
  centerY: number,
  radius: number,
  quarter: number,
  tolerance: number,
): void {
  const segments = arcSegmentCount(radius, tolerance);
  if (segments === 0) {
    out.push([cornerX, cornerY]);
    return;
  }
  const start = quarter * QUARTER_TURN;
  for (let i = 0; i <= segments; i++) {
    let dir: Point;
    if (i === 0) dir = AXIS_DIRECTIONS[quarter];
    else if (i === segments) dir = AXIS_DIRECTIONS[(quarter + 1) % 4];
    else {
      const angle = start + (QUARTER_TURN * i) / segments;
      dir = [Math.cos(angle), Math.sin(angle)];
    }
    out.push([centerX + dir[0] * radius, centerY + dir[1] * radius]);
  }
}

/**
 * Counter-clockwise (y up) outline of a rounded rectangle, without repeated
 * points.
 */
export function roundedRectOutline(bounds: Box2D, radii: BorderRadii, tolerance: number): Point[] {
  const minX = Math.min(bounds.min[0], bounds.max[0]);
  const maxX = Math.max(bounds.min[0], bounds.max[0]);
  const minY = Math.min(bounds.min[1], bounds.max[1]);
  const maxY = Math.max(bounds.min[1], bounds.max[1]);
  const width = maxX - minX;
  const height = maxY - minY;
  if (!(width > 0) || !(height > 0)) return [];

  const maxRadius = Math.min(width, height) / 2;
  const br = clampRadius(radii.bottomRight, maxRadius);
  const tr = clampRadius(radii.topRight, maxRadius);
  const tl = clampRadius(radii.topLeft, maxRadius);
  const bl = clampRadius(radii.bottomLeft, maxRadius);

  const raw: Point[] = [];
  pushCorner(raw, maxX, minY, maxX - br, minY + br, br, 3, tolerance);
  pushCorner(raw, maxX, maxY, maxX - tr, maxY - tr, tr, 0, tolerance);
  pushCorner(raw, minX, maxY, minX + tl, maxY - tl, tl, 1, tolerance);
  pushCorner(raw, minX, minY, minX + bl, minY + bl, bl, 2, tolerance);

  const outline: Point[] = [];
  for (const p of raw) {
    const prev = outline[outline.length - 1];
    if (prev && prev[0] === p[0] && prev[1] === p[1]) continue;
    outline.push(p);
  }
  const first = outline[0];
  const last = outline[outline.length - 1];
  if (outline.length > 1 && first[0] === last[0] && first[1] === last[1]) {
    outline.pop();
  }
  return outline;
}

function signedArea(a: Point, b: Point, c: Point): number {
  return (b[0] - a[0]) * (c[1] - a[1]) - (c[0] - a[0]) * (b[1] - a[1]);
}

function writeVertex(out: Float32Array, vertexIndex: number, p: Point, color: RgbaFloat): void {
  const o = vertexIndex * VERTEX_STRIDE;
  out[o] = p[0];
  out[o + 1] = p[1];
  out[o + 2] = 0;
  out[o + 3] = color[0];
  out[o + 4] = color[1];
  out[o + 5] = color[2];
  out[o + 6] = color[3];
}

/**
 * Tessellate a rounded rectangle into an unrolled triangle list of
 * position + colour vertices (7 floats each). Every triangle is emitted
 * counter-clockwise.
 *
 * Zero-area bounds give an empty buffer; radii are clamped to half the
 * shorter side.
 */
export function buildRoundedRect(
  bounds: Box2D,
  radii: BorderRadii,
  color: RgbaFloat,
  tolerance: number,
): Float32Array {
  const outline = roundedRectOutline(bounds, radii, tolerance);
  if (outline.length < 3) return new Float32Array(0);

  const indices = earcut(outline.flat());
  const vertices = new Float32Array(indices.length * VERTEX_STRIDE);

  for (let t = 0; t + 2 < indices.length; t += 3) {
    const a = outline[indices[t]];
    let b = outline[indices[t + 1]];
    let c = outline[indices[t + 2]];
    if (signedArea(a, b, c) < 0) [b, c] = [c, b];
    writeVertex(vertices, t, a, color);
    writeVertex(vertices, t + 1, b, color);
    writeVertex(vertices, t + 2, c, color);
  }

  return vertices;
}

export function uniformRadii(radius: number): BorderRadii {
  return { topLeft: radius, topRight: radius, bottomLeft: radius, bottomRight: radius };
}

/** Join per-shape vertex buffers into one upload. */
export function concatVertexBuffers(buffers: readonly Float32Array[]): Float32Array {
  let length = 0;
  for (const b of buffers) length += b.length;
  const out = new Float32Array(length);
  let offset = 0;
  for (const b of buffers) {
    out.set(b, offset);
    offset += b.length;
  }
  return out;
}
