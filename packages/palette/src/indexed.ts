import type { PixelBuffer, QuantizeResult, RGBA } from "./types.js";

/** Expands palette indices back into RGBA pixels. */
export function renderIndexed(palette: RGBA[], indices: Uint8Array, lookup?: Uint8Array): PixelBuffer {
  const out = new Uint8Array(indices.length * 4);
  for (let i = 0; i < indices.length; i++) {
    const idx = lookup ? lookup[indices[i]] : indices[i];
    const c = palette[idx];
    const o = i * 4;
    out[o] = c[0]; out[o + 1] = c[1]; out[o + 2] = c[2]; out[o + 3] = c[3];
  }
  return out;
}

export function paletteFrequencies({ palette, indices }: QuantizeResult): Uint32Array {
  const counts = new Uint32Array(palette.length);
  for (let i = 0; i < indices.length; i++) counts[indices[i]]++;
  return counts;
}

/** Palette indices by pixel count, most frequent first; ties keep palette order. */
export function orderByFrequency(counts: Uint32Array): number[] {
  return Array.from(counts.keys()).sort((a, b) => counts[b] - counts[a] || a - b);
}
