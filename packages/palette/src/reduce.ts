import { createLogger } from "@pngslim/log";
import { bisect, walkDown } from "./bisection.js";
import { ValidationError } from "./errors.js";
import { buildReference } from "./metric.js";
import { createPolicy, type PolicyContext } from "./policies.js";
import { MAX_SAMPLES, sampleIndices } from "./sampler.js";
import { parseDitherer, parseOptimizer } from "./strategies.js";
import type { PaletteQuantizer, PixelImage, ReduceOptions, ReduceResult, SearchMode } from "./types.js";

const log = createLogger("@palette/reduce");

type Resolved = Required<Omit<ReduceOptions, "lossyFraction">> & { lossyFraction: number };

const MODES: readonly SearchMode[] = ["bisect", "coverage", "prune"];

/** Checks the image and options before any pixel is touched. */
export function resolveReduceOptions(image: PixelImage, opts: ReduceOptions): Resolved {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new ValidationError(`invalid image size ${width}x${height}`);
  }
  if (data.length !== width * height * 4) {
    throw new ValidationError(`pixel buffer holds ${data.length} bytes; ${width}x${height} RGBA needs ${width * height * 4}`);
  }
  if (typeof opts.lossy !== "number" || !Number.isFinite(opts.lossy) || opts.lossy < 0) {
    throw new ValidationError(`lossy must be a finite Delta-E >= 0, got ${String(opts.lossy)}`);
  }
  const mode = opts.mode ?? "bisect";
  if (!MODES.includes(mode)) throw new ValidationError(`unknown search mode "${String(mode)}"`);

  const lossyFraction = opts.lossyFraction ?? 0;
  if (!Number.isFinite(lossyFraction) || lossyFraction < 0 || lossyFraction > 1) {
    throw new ValidationError(`lossyFraction must be within [0, 1], got ${String(opts.lossyFraction)}`);
  }
  if (mode === "coverage" && opts.lossyFraction === undefined) {
    throw new ValidationError("coverage mode needs lossyFraction");
  }
  const maxSamples = opts.maxSamples ?? MAX_SAMPLES;
  if (!Number.isInteger(maxSamples) || maxSamples < 1) {
    throw new ValidationError(`maxSamples must be a positive integer, got ${String(maxSamples)}`);
  }

  const optimizer = opts.optimizer ?? "kmeans";
  const ditherer = opts.ditherer ?? "ordered";
  // unknown strategy names fail here, before any quantization
  parseOptimizer(optimizer);
  parseDitherer(ditherer);

  return { lossy: opts.lossy, mode, lossyFraction, optimizer, ditherer, verify: opts.verify ?? false, maxSamples };
}

/**
 * Smallest palette whose score stays within budget, then the delivered
 * pixels at that size. A zero budget is honoured here (it converges on
 * the exact color count, up to 256); `reducePalette` treats zero as
 * "leave the image alone" instead. An empty image has no palette.
 */
export function searchPaletteSize(
  image: PixelImage,
  opts: ReduceOptions,
  quantizer: PaletteQuantizer
): ReduceResult {
  const o = resolveReduceOptions(image, opts);
  const total = image.width * image.height;
  if (total === 0) {
    return { data: image.data.slice(), paletteSize: null, metric: 0, mode: o.mode, steps: [] };
  }

  const samples = sampleIndices(total, o.maxSamples);
  const ctx: PolicyContext = {
    image,
    quantizer,
    optimizer: parseOptimizer(o.optimizer),
    ditherer: parseDitherer(o.ditherer),
    reference: buildReference(image.data, samples),
    scratch: new Map<number, number>(),
  };
  const policy = createPolicy(o.mode, ctx, o);

  const seen = new Map<number, number>();
  const measure = (size: number) => {
    let m = seen.get(size);
    if (m === undefined) {
      m = policy.measure(size);
      seen.set(size, m);
      log.debug({ mode: policy.mode, size, metric: m }, "search.step");
    }
    return m;
  };

  const { lo, hi } = policy.range();
  let { size, steps } = bisect(lo, hi, measure, policy.budget);
  if (o.verify && size > lo) {
    const walked = walkDown(size, lo, measure, policy.budget);
    size = walked.size;
    steps = [...steps, ...walked.steps];
  }

  const data = policy.materialize(size);
  const metric = measure(size);
  log.info({ mode: policy.mode, samples: samples.length, range: [lo, hi], size, metric, steps: steps.length }, "search.done");
  return { data, paletteSize: size, metric, mode: policy.mode, steps };
}

/** Palette reduction as the optimizer runs it: a zero budget leaves pixels untouched. */
export function reducePalette(
  image: PixelImage,
  opts: ReduceOptions,
  quantizer: PaletteQuantizer
): ReduceResult {
  const o = resolveReduceOptions(image, opts);
  const disabled = o.mode === "coverage" ? o.lossyFraction <= 0 : o.lossy <= 0;
  if (disabled) {
    return { data: image.data, paletteSize: null, metric: 0, mode: "lossless", steps: [] };
  }
  return searchPaletteSize(image, opts, quantizer);
}
