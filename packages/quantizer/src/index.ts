export { quantize, defaultQuantizer, KMEANS_TRAINING_LIMIT } from "./engine.js";
export { buildHistogram, coarsen, type Histogram } from "./histogram.js";
export { medianCut } from "./medianCut.js";
export { kmeans } from "./kmeans.js";
export { applyDitherer } from "./dither.js";
export { PaletteMatcher, nearestIndex } from "./nearest.js";
