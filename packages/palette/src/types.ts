export type RGBA = [number, number, number, number];

/** CIE L*a*b* coordinates: lightness, green–red, blue–yellow. */
export type Lab = [number, number, number];

/** Row-major RGBA, one byte per channel. */
export type PixelBuffer = Uint8Array;

export type PixelImage = {
  data: PixelBuffer;
  width: number;
  height: number;
};

export type IndexedImage = {
  width: number;
  height: number;
  palette: RGBA[];            // 1..256 entries
  indices: Uint8Array;        // one entry per pixel, each < palette.length
};

export type OptimizerName = "none" | "kmeans" | "weighted-kmeans";

export type DithererName =
  | "none"
  | "ordered"
  | "floyd-steinberg"
  | "floyd-steinberg-vanilla"
  | "floyd-steinberg-checkered";

export type Optimizer =
  | { kind: "none" }
  | { kind: "kmeans"; weighted: boolean; iterations: number };

export type Ditherer =
  | { kind: "none" }
  | { kind: "ordered"; matrix: 4 }
  | { kind: "floyd-steinberg"; diffusion: number; checkered: boolean };

export type QuantizeResult = {
  palette: RGBA[];
  indices: Uint8Array;
};

/**
 * Palette-clustering engine. Treated as a pure function: the same
 * pixels, size and strategies always give the same palette.
 */
export interface PaletteQuantizer {
  quantize(
    pixels: PixelBuffer,
    width: number,
    targetSize: number,
    optimizer: Optimizer,
    ditherer: Ditherer
  ): QuantizeResult;
}

export type SearchMode = "bisect" | "coverage" | "prune";

export type ReduceOptions = {
  /** Max CIE76 Delta-E; 0 disables the search. */
  lossy: number;
  mode?: SearchMode;          // default "bisect"
  /** Share of pixels the coverage remap may give up, 0..1. */
  lossyFraction?: number;
  /** One of OPTIMIZERS, any case; default "kmeans". */
  optimizer?: string;
  /** One of DITHERERS, any case; final pass only; default "ordered". */
  ditherer?: string;
  /** Walk down from the bisection result while smaller sizes still pass. */
  verify?: boolean;
  maxSamples?: number;        // default 50_000
};

export type SearchStep = {
  size: number;
  metric: number;
  accepted: boolean;
};

export type ReduceResult = {
  data: PixelBuffer;
  /** null when the search is disabled (lossless). */
  paletteSize: number | null;
  /** Metric of the controlling (undithered) evaluation at paletteSize. */
  metric: number;
  mode: SearchMode | "lossless";
  steps: SearchStep[];
};
