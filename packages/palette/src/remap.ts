import { paletteFrequencies, orderByFrequency } from "./indexed.js";
import { rgbToLab } from "./lab.js";
import { nearestRetained, worstRetainedDeltaE } from "./metric.js";
import type { Lab, QuantizeResult, RGBA } from "./types.js";

export type Remap = {
  /** Old palette index -> index of the entry it now renders as. */
  lookup: Uint8Array;
  /** Kept entries, most frequent first. */
  retained: number[];
};

function squaredRGBA(a: RGBA, b: RGBA): number {
  const dr = a[0] - b[0], dg = a[1] - b[1], db = a[2] - b[2], da = a[3] - b[3];
  return dr * dr + dg * dg + db * db + da * da;
}

/** Nearest of `candidates` by squared RGBA distance; first minimum wins. */
export function nearestRGBA(palette: RGBA[], candidates: readonly number[], color: RGBA): number {
  let best = candidates[0];
  let bestD = Infinity;
  for (const idx of candidates) {
    const d = squaredRGBA(color, palette[idx]);
    if (d < bestD) { bestD = d; best = idx; }
  }
  return best;
}

function identityLookup(size: number): Uint8Array {
  return Uint8Array.from({ length: size }, (_, i) => i);
}

/** Non-retained entries render as their nearest retained entry in RGBA. */
export function coverageLookup(q: QuantizeResult, retained: number[]): Remap {
  const kept = new Set(retained);
  const lookup = identityLookup(q.palette.length);
  q.palette.forEach((color, idx) => {
    if (!kept.has(idx)) lookup[idx] = nearestRGBA(q.palette, retained, color);
  });
  return { lookup, retained };
}

export type FrequencyRanking = {
  /** Palette indices with at least one pixel, most frequent first. */
  used: number[];
  counts: Uint32Array;
  /** Lab of each `used` entry, same order. */
  usedLab: Lab[];
};

export function rankPalette(q: QuantizeResult): FrequencyRanking {
  const counts = paletteFrequencies(q);
  const used = orderByFrequency(counts).filter((idx) => counts[idx] > 0);
  const usedLab = used.map((idx) => {
    const [r, g, b] = q.palette[idx];
    return rgbToLab(r, g, b);
  });
  return { used, counts, usedLab };
}

/**
 * Pixels covered by the `n` most frequent entries, for every `n` from 0 to
 * `used.length`.
 */
export function coverageCurve(ranking: FrequencyRanking): number[] {
  const covered = [0];
  for (const idx of ranking.used) covered.push(covered[covered.length - 1] + ranking.counts[idx]);
  return covered;
}

const firstN = (n: number) => Array.from({ length: n }, (_, i) => i);

/** Worst Delta-E when only the `n` most frequent entries are kept. */
export function pruneScore(ranking: FrequencyRanking, n: number): number {
  return worstRetainedDeltaE(ranking.usedLab, firstN(Math.min(n, ranking.used.length)));
}

/** Keeps the `n` most frequent entries; the others render as their nearest kept entry in Lab. */
export function pruneLookup(q: QuantizeResult, ranking: FrequencyRanking, n: number): Remap {
  const { used, usedLab } = ranking;
  const local = firstN(Math.min(n, used.length));
  const lookup = identityLookup(q.palette.length);
  used.forEach((idx, i) => {
    if (i >= local.length) lookup[idx] = used[nearestRetained(usedLab, local, usedLab[i])];
  });
  return { lookup, retained: local.map((i) => used[i]) };
}
