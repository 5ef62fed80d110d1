import { colorKey, type RGBA } from "@pngslim/palette";

/** Nearest entry by squared RGBA distance; first minimum wins. */
export function nearestIndex(palette: RGBA[], c: ArrayLike<number>): number {
  let best = 0;
  let bestD = Infinity;
  for (let i = 0; i < palette.length; i++) {
    const p = palette[i];
    const dr = c[0] - p[0], dg = c[1] - p[1], db = c[2] - p[2], da = c[3] - p[3];
    const d = dr * dr + dg * dg + db * db + da * da;
    if (d < bestD) { bestD = d; best = i; }
  }
  return best;
}

/** Memoised nearest-entry lookup for integer colors. */
export class PaletteMatcher {
  private readonly cache = new Map<number, number>();

  constructor(readonly palette: RGBA[]) {}

  match(r: number, g: number, b: number, a: number): number {
    const key = colorKey(r, g, b, a);
    let idx = this.cache.get(key);
    if (idx === undefined) {
      idx = nearestIndex(this.palette, [r, g, b, a]);
      this.cache.set(key, idx);
    }
    return idx;
  }
}
