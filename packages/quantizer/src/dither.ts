import type { Ditherer, PixelBuffer } from "@pngslim/palette";
import { PaletteMatcher } from "./nearest.js";

// 4x4 Bayer threshold matrix
const BAYER4 = [
  [0, 8, 2, 10],
  [12, 4, 14, 6],
  [3, 11, 1, 9],
  [15, 7, 13, 5],
];
const ORDERED_SPREAD = 32;

const clamp8 = (v: number) => (v < 0 ? 0 : v > 255 ? 255 : Math.round(v));

function mapPlain(data: PixelBuffer, matcher: PaletteMatcher, out: Uint8Array): void {
  for (let i = 0, o = 0; i < out.length; i++, o += 4) {
    out[i] = matcher.match(data[o], data[o + 1], data[o + 2], data[o + 3]);
  }
}

function mapOrdered(data: PixelBuffer, width: number, matcher: PaletteMatcher, out: Uint8Array): void {
  for (let i = 0, o = 0; i < out.length; i++, o += 4) {
    const x = i % width;
    const y = Math.floor(i / width);
    const offset = ((BAYER4[y & 3][x & 3] + 0.5) / 16 - 0.5) * ORDERED_SPREAD;
    out[i] = matcher.match(clamp8(data[o] + offset), clamp8(data[o + 1] + offset), clamp8(data[o + 2] + offset), data[o + 3]);
  }
}

/**
 * Error diffusion (7/16 ahead, 3/16 behind-below, 5/16 below, 1/16
 * ahead-below) on RGB, scaled by `diffusion`. Rows run left to right. With
 * `checkered`, cells where x + y is odd mirror the lower-row weights
 * (3/16 ahead-below, 1/16 behind-below).
 */
function mapDiffused(
  data: PixelBuffer,
  width: number,
  matcher: PaletteMatcher,
  out: Uint8Array,
  diffusion: number,
  checkered: boolean
): void {
  const height = width > 0 ? out.length / width : 0;
  const palette = matcher.palette;
  let cur = new Float32Array((width + 2) * 3);
  let next = new Float32Array((width + 2) * 3);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const o = i * 4;
      const e = (x + 1) * 3;
      const r = clamp8(data[o] + cur[e]);
      const g = clamp8(data[o + 1] + cur[e + 1]);
      const b = clamp8(data[o + 2] + cur[e + 2]);
      const idx = matcher.match(r, g, b, data[o + 3]);
      out[i] = idx;

      const p = palette[idx];
      const err = [(r - p[0]) * diffusion, (g - p[1]) * diffusion, (b - p[2]) * diffusion];
      const mirrored = checkered && ((x + y) & 1) === 1;
      const ahead = e + 3;
      const heavy = mirrored ? ahead : e - 3;
      const light = mirrored ? e - 3 : ahead;
      for (let ch = 0; ch < 3; ch++) {
        cur[ahead + ch] += (err[ch] * 7) / 16;
        next[heavy + ch] += (err[ch] * 3) / 16;
        next[e + ch] += (err[ch] * 5) / 16;
        next[light + ch] += err[ch] / 16;
      }
    }
    [cur, next] = [next, cur];
    next.fill(0);
  }
}

/** Palette index per pixel under the given ditherer. */
export function applyDitherer(
  data: PixelBuffer,
  width: number,
  matcher: PaletteMatcher,
  ditherer: Ditherer
): Uint8Array {
  const out = new Uint8Array(data.length / 4);
  switch (ditherer.kind) {
    case "none":
      mapPlain(data, matcher, out);
      break;
    case "ordered":
      mapOrdered(data, width, matcher, out);
      break;
    case "floyd-steinberg":
      mapDiffused(data, width, matcher, out, ditherer.diffusion, ditherer.checkered);
      break;
  }
  return out;
}
