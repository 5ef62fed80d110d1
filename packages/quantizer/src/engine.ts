import {
  pixelKey,
  type Ditherer, type Optimizer, type PaletteQuantizer, type PixelBuffer, type QuantizeResult, type RGBA,
} from "@pngslim/palette";
import { applyDitherer } from "./dither.js";
import { buildHistogram, coarsen, type Histogram } from "./histogram.js";
import { kmeans } from "./kmeans.js";
import { medianCut } from "./medianCut.js";
import { PaletteMatcher } from "./nearest.js";

/** Above this many distinct colors k-means trains on a 5-bit histogram. */
export const KMEANS_TRAINING_LIMIT = 32_768;

const toByte = (v: number) => Math.min(255, Math.max(0, Math.round(v)));

function trainingSet(h: Histogram): Histogram {
  return h.colors.length > KMEANS_TRAINING_LIMIT ? coarsen(h, 5) : h;
}

function buildPalette(h: Histogram, targetSize: number, optimizer: Optimizer): RGBA[] {
  const seeds = medianCut(h.colors, h.counts, targetSize);
  if (optimizer.kind === "none") return seeds;
  const train = trainingSet(h);
  const weights = optimizer.weighted ? train.counts : new Uint32Array(train.colors.length).fill(1);
  return kmeans(train.colors, weights, seeds, optimizer.iterations);
}

/**
 * Reduces `pixels` to at most `targetSize` colors. When the image already
 * fits, the palette is its distinct colors in first-seen order and every
 * pixel maps to itself whatever the ditherer.
 */
export function quantize(
  pixels: PixelBuffer,
  width: number,
  targetSize: number,
  optimizer: Optimizer,
  ditherer: Ditherer
): QuantizeResult {
  if (!Number.isInteger(targetSize) || targetSize < 1 || targetSize > 256) {
    throw new RangeError(`targetSize must be an integer within [1, 256], got ${targetSize}`);
  }
  if (pixels.length % 4 !== 0 || (width > 0 && (pixels.length / 4) % width !== 0)) {
    throw new RangeError(`pixel buffer of ${pixels.length} bytes is not a ${width}-wide RGBA image`);
  }

  const h = buildHistogram(pixels);
  if (h.colors.length <= targetSize) {
    const slot = new Map<number, number>();
    h.keys.forEach((key, i) => slot.set(key, i));
    const indices = new Uint8Array(pixels.length / 4);
    for (let i = 0; i < indices.length; i++) indices[i] = slot.get(pixelKey(pixels, i)) ?? 0;
    return { palette: h.colors.length ? h.colors : [[0, 0, 0, 0]], indices };
  }

  const palette = buildPalette(h, targetSize, optimizer).map((c): RGBA => [toByte(c[0]), toByte(c[1]), toByte(c[2]), toByte(c[3])]);
  const indices = applyDitherer(pixels, width, new PaletteMatcher(palette), ditherer);
  return { palette, indices };
}

export const defaultQuantizer: PaletteQuantizer = { quantize };
