import type { PackedColor, Rgba8, RgbaFloat } from '../types/render.types';

/**
 * Split a packed 0xRRGGBBAA colour into its bytes, most significant first.
 */
export function unpackColor(color: PackedColor): Rgba8 {
  return [
    (color >>> 24) & 0xff,
    (color >>> 16) & 0xff,
    (color >>> 8) & 0xff,
    color & 0xff,
  ];
}

/**
 * Convert colour bytes to 0-1 floats. The palette leaves the alpha byte at
 * zero, which is drawn as fully opaque.
 */
export function toVertexColor(rgba: Rgba8): RgbaFloat {
  const [r, g, b, a] = rgba;
  return [r / 255, g / 255, b / 255, a === 0 ? 1 : a / 255];
}

export function packedToVertexColor(color: PackedColor): RgbaFloat {
  return toVertexColor(unpackColor(color));
}

/**
 * Convert a packed colour to a CSS hex string (alpha dropped).
 */
export function hexToCSS(color: PackedColor): string {
  return `#${(color >>> 8).toString(16).padStart(6, '0')}`;
}
