import { keyToRGBA, pixelKey, type PixelBuffer, type RGBA } from "@pngslim/palette";

export type Histogram = {
  /** Distinct colors in first-seen order. */
  colors: RGBA[];
  keys: Uint32Array;
  counts: Uint32Array;
};

export function buildHistogram(data: PixelBuffer): Histogram {
  const slot = new Map<number, number>();
  const keys: number[] = [];
  const counts: number[] = [];
  for (let pos = 0, n = data.length / 4; pos < n; pos++) {
    const key = pixelKey(data, pos);
    const i = slot.get(key);
    if (i === undefined) {
      slot.set(key, keys.length);
      keys.push(key);
      counts.push(1);
    } else {
      counts[i]++;
    }
  }
  return { colors: keys.map(keyToRGBA), keys: Uint32Array.from(keys), counts: Uint32Array.from(counts) };
}

/**
 * Merges colors that agree in their top `bits` per channel into one
 * weighted mean, so training stays bounded on photographic input.
 */
export function coarsen(h: Histogram, bits: number): Histogram {
  const shift = 8 - bits;
  const bins = new Map<number, { sum: [number, number, number, number]; count: number }>();
  h.colors.forEach((c, i) => {
    const w = h.counts[i];
    const bin = (((c[0] >> shift) << (3 * bits)) | ((c[1] >> shift) << (2 * bits)) | ((c[2] >> shift) << bits) | (c[3] >> shift)) >>> 0;
    let acc = bins.get(bin);
    if (!acc) { acc = { sum: [0, 0, 0, 0], count: 0 }; bins.set(bin, acc); }
    for (let ch = 0; ch < 4; ch++) acc.sum[ch] += c[ch] * w;
    acc.count += w;
  });
  const colors: RGBA[] = [];
  const counts: number[] = [];
  for (const { sum, count } of bins.values()) {
    colors.push([sum[0] / count, sum[1] / count, sum[2] / count, sum[3] / count]);
    counts.push(count);
  }
  return { colors, keys: new Uint32Array(0), counts: Uint32Array.from(counts) };
}
