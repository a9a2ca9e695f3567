/** Packed 0xRRGGBBAA colour. */
export type PackedColor = number;

/** Colour channels as bytes, most significant first. */
export type Rgba8 = readonly [number, number, number, number];

/** Colour channels as 0-1 floats, ready for a vertex attribute. */
export type RgbaFloat = readonly [number, number, number, number];

export interface EntityVisual {
  size: number;
  color: PackedColor;
}

export interface Box2D {
  min: readonly [number, number];
  max: readonly [number, number];
}

export interface BorderRadii {
  topLeft: number;
  topRight: number;
  bottomLeft: number;
  bottomRight: number;
}

/** Floats per vertex: x, y, z, r, g, b, a. */
export const VERTEX_STRIDE = 7;

export const FLOAT_BYTES = 4;
