import type { PixelBuffer, RGBA } from "./types.js";

/** Packs RGBA into an unsigned 32-bit key; equal channels <=> equal keys. */
export function colorKey(r: number, g: number, b: number, a: number): number {
  return ((r << 24) | (g << 16) | (b << 8) | a) >>> 0;
}

export function pixelKey(data: PixelBuffer, pos: number): number {
  const o = pos * 4;
  return colorKey(data[o], data[o + 1], data[o + 2], data[o + 3]);
}

export function keyToRGBA(key: number): RGBA {
  return [(key >>> 24) & 0xff, (key >>> 16) & 0xff, (key >>> 8) & 0xff, key & 0xff];
}

export function countUniqueColors(data: PixelBuffer): number {
  const seen = new Set<number>();
  for (let pos = 0, n = data.length / 4; pos < n; pos++) seen.add(pixelKey(data, pos));
  return seen.size;
}
