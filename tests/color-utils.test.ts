import { describe, expect, it } from 'vitest';
import { hexToCSS, packedToVertexColor, toVertexColor, unpackColor } from '../src/utils/ColorUtils';

describe('ColorUtils', () => {
  it('unpacks bytes most significant first', () => {
    expect(unpackColor(0xeb790700)).toEqual([235, 121, 7, 0]);
    expect(unpackColor(0x01020304)).toEqual([1, 2, 3, 4]);
  });

  it('treats a zero alpha byte as opaque', () => {
    expect(toVertexColor([255, 0, 51, 0])).toEqual([1, 0, 0.2, 1]);
  });

  it('scales a non-zero alpha byte', () => {
    const [r, g, b, a] = packedToVertexColor(0xff000080);
    expect([r, g, b]).toEqual([1, 0, 0]);
    expect(a).toBeCloseTo(128 / 255);
  });

  it('formats CSS hex without alpha', () => {
    expect(hexToCSS(0x30b5f700)).toBe('#30b5f7');
    expect(hexToCSS(0x00000100)).toBe('#000001');
  });
});
