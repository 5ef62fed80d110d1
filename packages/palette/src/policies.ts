import { ClusteringError, PngslimError } from "./errors.js";
import { countUniqueColors } from "./colorKey.js";
import { renderIndexed } from "./indexed.js";
import { p95GroupedDeltaE, type SampleReference } from "./metric.js";
import { coverageCurve, coverageLookup, pruneLookup, pruneScore, rankPalette } from "./remap.js";
import { NO_DITHER } from "./strategies.js";
import type {
  Ditherer, Optimizer, PaletteQuantizer, PixelBuffer, PixelImage, QuantizeResult, SearchMode,
} from "./types.js";

export const MAX_PALETTE = 256;

export type PolicyContext = {
  image: PixelImage;
  quantizer: PaletteQuantizer;
  optimizer: Optimizer;
  /**
   * Ditherer for pixels re-clustered at the final size. Measurement and the
   * single 256-color pass of the remap policies never dither.
   */
  ditherer: Ditherer;
  reference: SampleReference;
  /** Reused by every measurement of one image. */
  scratch: Map<number, number>;
};

export type SearchRange = { lo: number; hi: number };

/**
 * One way of scoring a candidate palette size. The bisection driver only
 * sees this interface, so each variant supplies its own range, score and
 * rendering.
 */
export interface SearchPolicy {
  readonly mode: SearchMode;
  /** Pass mark for `measure`, in the policy's own units. */
  readonly budget: number;
  range(): SearchRange;
  measure(size: number): number;
  materialize(size: number): PixelBuffer;
}

export function runQuantizer(ctx: PolicyContext, size: number, ditherer: Ditherer): QuantizeResult {
  const target = Math.min(MAX_PALETTE, Math.max(1, Math.floor(size)));
  try {
    return ctx.quantizer.quantize(ctx.image.data, ctx.image.width, target, ctx.optimizer, ditherer);
  } catch (err) {
    if (err instanceof PngslimError) throw err;
    throw new ClusteringError(target, err);
  }
}

function once<T>(fn: () => T): () => T {
  let value: { v: T } | undefined;
  return () => (value ??= { v: fn() }).v;
}

/** Re-clusters at every candidate size, scored by the grouped p95 Delta-E. */
export function bisectPolicy(ctx: PolicyContext, budget: number): SearchPolicy {
  const measureAt = (size: number) => {
    const q = runQuantizer(ctx, size, NO_DITHER);
    return renderIndexed(q.palette, q.indices);
  };
  const full = once(() => measureAt(MAX_PALETTE));

  return {
    mode: "bisect",
    budget,
    range() {
      // when even the largest palette misses the budget, settle on it
      if (this.measure(MAX_PALETTE) > budget) return { lo: MAX_PALETTE, hi: MAX_PALETTE };
      return { lo: 1, hi: Math.min(MAX_PALETTE, countUniqueColors(full())) };
    },
    measure(size) {
      const pixels = size >= MAX_PALETTE ? full() : measureAt(size);
      return p95GroupedDeltaE(ctx.reference, pixels, ctx.scratch);
    },
    materialize(size) {
      const q = runQuantizer(ctx, size, ctx.ditherer);
      return renderIndexed(q.palette, q.indices);
    },
  };
}

/**
 * Clusters once at 256 and keeps the most frequent entries until they
 * cover (1 - lossyFraction) of the pixels. Scores a size by how many
 * pixels are still short of that target.
 */
export function coveragePolicy(ctx: PolicyContext, lossyFraction: number): SearchPolicy {
  const base = once(() => {
    const q = runQuantizer(ctx, MAX_PALETTE, NO_DITHER);
    const ranking = rankPalette(q);
    return { q, ranking, covered: coverageCurve(ranking), target: Math.ceil((1 - lossyFraction) * q.indices.length) };
  });

  return {
    mode: "coverage",
    budget: 0,
    range() {
      return { lo: 1, hi: Math.max(1, base().ranking.used.length) };
    },
    measure(size) {
      const { covered, target } = base();
      return Math.max(0, target - covered[Math.min(size, covered.length - 1)]);
    },
    materialize(size) {
      const { q, ranking } = base();
      const { lookup } = coverageLookup(q, ranking.used.slice(0, Math.max(1, size)));
      return renderIndexed(q.palette, q.indices, lookup);
    },
  };
}

/**
 * Clusters once at 256 and drops the least frequent entries while no
 * dropped entry lands further than `budget` Delta-E from a kept one.
 */
export function prunePolicy(ctx: PolicyContext, budget: number): SearchPolicy {
  const base = once(() => {
    const q = runQuantizer(ctx, MAX_PALETTE, NO_DITHER);
    return { q, ranking: rankPalette(q) };
  });

  return {
    mode: "prune",
    budget,
    range() {
      return { lo: 1, hi: Math.max(1, base().ranking.used.length) };
    },
    measure(size) {
      return pruneScore(base().ranking, size);
    },
    materialize(size) {
      const { q, ranking } = base();
      return renderIndexed(q.palette, q.indices, pruneLookup(q, ranking, size).lookup);
    },
  };
}

export function createPolicy(
  mode: SearchMode,
  ctx: PolicyContext,
  budget: { lossy: number; lossyFraction: number }
): SearchPolicy {
  switch (mode) {
    case "bisect":
      return bisectPolicy(ctx, budget.lossy);
    case "coverage":
      return coveragePolicy(ctx, budget.lossyFraction);
    case "prune":
      return prunePolicy(ctx, budget.lossy);
  }
}
