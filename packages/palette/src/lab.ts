import type { Lab, PixelBuffer } from "./types.js";

// D65 reference white (X and Z; Y is 1)
const WHITE_X = 0.95047;
const WHITE_Z = 1.08883;

/** Inverse sRGB companding, input in [0, 1]. */
export function srgbToLinear(u: number): number {
  return u > 0.04045 ? Math.pow((u + 0.055) / 1.055, 2.4) : u / 12.92;
}

function labF(t: number): number {
  return t > 0.008856 ? Math.cbrt(t) : (903.3 * t + 16) / 116;
}

/**
 * sRGB (8 bits per channel) to CIE L*a*b* under D65.
 * Alpha is not part of the coordinate.
 */
export function rgbToLab(r8: number, g8: number, b8: number): Lab {
  const r = srgbToLinear(r8 / 255);
  const g = srgbToLinear(g8 / 255);
  const b = srgbToLinear(b8 / 255);

  const x = (0.4124564 * r + 0.3575761 * g + 0.1804375 * b) / WHITE_X;
  const y = 0.2126729 * r + 0.7151522 * g + 0.072175 * b;
  const z = (0.0193339 * r + 0.119192 * g + 0.9503041 * b) / WHITE_Z;

  const fx = labF(x);
  const fy = labF(y);
  const fz = labF(z);
  return [116 * fy - 16, 500 * (fx - fy), 200 * (fy - fz)];
}

/** Lab of the pixel at `pos` (pixel position, not byte offset). */
export function pixelLab(data: PixelBuffer, pos: number): Lab {
  const o = pos * 4;
  return rgbToLab(data[o], data[o + 1], data[o + 2]);
}

/** CIE76 Delta-E. */
export function deltaE(a: Lab, b: Lab): number {
  const dl = a[0] - b[0];
  const da = a[1] - b[1];
  const db = a[2] - b[2];
  return Math.sqrt(dl * dl + da * da + db * db);
}
