import type { Ditherer, Optimizer, PaletteQuantizer, PixelImage, QuantizeResult, RGBA } from "../src/index.js";

export const BLACK: RGBA = [0, 0, 0, 255];
export const WHITE: RGBA = [255, 255, 255, 255];
export const RED: RGBA = [255, 0, 0, 255];
export const BLUE: RGBA = [0, 0, 255, 255];

export function pixels(colors: RGBA[]): Uint8Array {
  const out = new Uint8Array(colors.length * 4);
  colors.forEach((c, i) => out.set(c, i * 4));
  return out;
}

export function image(colors: RGBA[], width: number): PixelImage {
  return { data: pixels(colors), width, height: width ? colors.length / width : 0 };
}

/** `n` copies of each color, in order. */
export function runs(...parts: [RGBA, number][]): RGBA[] {
  return parts.flatMap(([c, n]) => Array.from({ length: n }, () => c));
}

/**
 * Keeps the first `target` distinct colors in first-seen order and maps
 * every pixel to the nearest of them. Ignores strategies.
 */
export function firstSeenQuantize(
  data: Uint8Array,
  _width: number,
  target: number,
  _optimizer: Optimizer,
  _ditherer: Ditherer
): QuantizeResult {
  const palette: RGBA[] = [];
  const seen = new Set<string>();
  for (let o = 0; o < data.length; o += 4) {
    const c: RGBA = [data[o], data[o + 1], data[o + 2], data[o + 3]];
    const k = c.join(",");
    if (!seen.has(k) && palette.length < target) { seen.add(k); palette.push(c); }
  }
  if (palette.length === 0) palette.push([0, 0, 0, 0]);
  const indices = new Uint8Array(data.length / 4);
  for (let i = 0; i < indices.length; i++) {
    let best = 0, bestD = Infinity;
    palette.forEach((p, j) => {
      const d = p.reduce((acc, v, ch) => acc + (v - data[i * 4 + ch]) ** 2, 0);
      if (d < bestD) { bestD = d; best = j; }
    });
    indices[i] = best;
  }
  return { palette, indices };
}

export const firstSeenQuantizer: PaletteQuantizer = { quantize: firstSeenQuantize };
