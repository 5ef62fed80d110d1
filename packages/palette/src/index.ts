export * from "./types.js";
export * from "./errors.js";
export { OPTIMIZERS, DITHERERS, NO_DITHER, parseOptimizer, parseDitherer, isOptimizerName, isDithererName } from "./strategies.js";
export { rgbToLab, pixelLab, deltaE, srgbToLinear } from "./lab.js";
export { colorKey, pixelKey, keyToRGBA, countUniqueColors } from "./colorKey.js";
export { MAX_SAMPLES, sampleIndices } from "./sampler.js";
export {
  GROUP_PERCENTILE, buildReference, percentileOfSorted, p95GroupedDeltaE, nearestRetained, worstRetainedDeltaE,
  type SampleReference,
} from "./metric.js";
export { bisect, walkDown, type Bisection } from "./bisection.js";
export { renderIndexed, paletteFrequencies, orderByFrequency } from "./indexed.js";
export {
  coverageCurve, coverageLookup, pruneLookup, pruneScore, rankPalette, nearestRGBA,
  type Remap, type FrequencyRanking,
} from "./remap.js";
export {
  MAX_PALETTE, createPolicy, bisectPolicy, coveragePolicy, prunePolicy, runQuantizer,
  type SearchPolicy, type PolicyContext, type SearchRange,
} from "./policies.js";
export { reducePalette, searchPaletteSize, resolveReduceOptions } from "./reduce.js";
