import { pixelKey } from "./colorKey.js";
import { deltaE, pixelLab } from "./lab.js";
import type { Lab, PixelBuffer } from "./types.js";

export const GROUP_PERCENTILE = 0.95;

/** Sampled source pixels, converted once per image and reused by every step. */
export type SampleReference = {
  samples: number[];
  lab: Lab[];
  keys: Uint32Array;
};

export function buildReference(source: PixelBuffer, samples: number[]): SampleReference {
  const lab = samples.map((pos) => pixelLab(source, pos));
  const keys = new Uint32Array(samples.length);
  samples.forEach((pos, j) => { keys[j] = pixelKey(source, pos); });
  return { samples, lab, keys };
}

/**
 * Value at rank ceil(q * n) - 1 of an ascending array, clamped to the
 * valid range. Empty input gives 0.
 */
export function percentileOfSorted(sorted: ArrayLike<number>, q: number): number {
  const n = sorted.length;
  if (n === 0) return 0;
  const rank = Math.max(0, Math.ceil(n * q) - 1);
  return sorted[Math.min(rank, n - 1)];
}

/**
 * 95th percentile over source colors of the worst Delta-E each color
 * suffers in `candidate`. A color covering most of the image still gets a
 * single vote.
 *
 * `scratch` is owned by the caller and cleared here on every call.
 */
export function p95GroupedDeltaE(
  ref: SampleReference,
  candidate: PixelBuffer,
  scratch: Map<number, number>
): number {
  scratch.clear();
  const { samples, lab, keys } = ref;
  for (let j = 0; j < samples.length; j++) {
    const de = deltaE(lab[j], pixelLab(candidate, samples[j]));
    const prev = scratch.get(keys[j]);
    if (prev === undefined || de > prev) scratch.set(keys[j], de);
  }
  if (scratch.size === 0) return 0;
  const maxima = Float64Array.from(scratch.values()).sort();
  return percentileOfSorted(maxima, GROUP_PERCENTILE);
}

/** Index of the retained entry nearest to `color` in Lab; first minimum wins. */
export function nearestRetained(paletteLab: Lab[], retained: readonly number[], color: Lab): number {
  let best = retained[0];
  let bestD = Infinity;
  for (const idx of retained) {
    const d = deltaE(color, paletteLab[idx]);
    if (d < bestD) { bestD = d; best = idx; }
  }
  return best;
}

/**
 * Worst distance any discarded entry travels to its nearest retained
 * entry. No smoothing; 0 when nothing is discarded.
 */
export function worstRetainedDeltaE(paletteLab: Lab[], retained: readonly number[]): number {
  if (retained.length === 0) return paletteLab.length ? Infinity : 0;
  const kept = new Set(retained);
  let worst = 0;
  paletteLab.forEach((color, idx) => {
    if (kept.has(idx)) return;
    const d = deltaE(color, paletteLab[nearestRetained(paletteLab, retained, color)]);
    if (d > worst) worst = d;
  });
  return worst;
}
