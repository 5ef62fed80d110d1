import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { compressPng, decodeImage, inspectImage, optimizeAlpha, type CompressSource } from "@pngslim/adapters";
import { ensureDir } from "@pngslim/config";
import { createLogger, type Logger } from "@pngslim/log";
import { ValidationError, reducePalette, type PaletteQuantizer, type ReduceResult } from "@pngslim/palette";
import { defaultQuantizer } from "@pngslim/quantizer";
import type { OptimizeOptions } from "@pngslim/schemas";
import { commonPrefixIndex, reportLine } from "./report.js";

const defaultLog = createLogger("@optimize/batch");

export type OptimizeDeps = {
  quantizer?: PaletteQuantizer;
  log?: Logger;
};

export type ImageResult = {
  data: Buffer;
  /** Colors in the reduced palette; null when pixels were kept. */
  paletteSize: number | null;
  metric: number;
  mode: ReduceResult["mode"];
};

export type FileResult = {
  input: string;
  output: string;
  inputBytes: number;
  outputBytes: number;
  paletteSize: number | null;
  metric: number;
};

/** Whether `opts` asks for palette reduction at all. */
export function isLossy(opts: OptimizeOptions): boolean {
  return opts.mode === "coverage" ? (opts.lossyFraction ?? 0) > 0 : opts.lossy > 0;
}

/**
 * Optional palette reduction, then lossless compression. Untouched pixels
 * are re-encoded straight from the source so metadata rules apply.
 */
export async function optimizeImage(
  input: string | Buffer,
  opts: OptimizeOptions,
  deps: OptimizeDeps = {}
): Promise<ImageResult> {
  const compressOpts = { level: opts.level, strip: opts.strip, interlace: opts.interlace, fast: opts.fast, timeout: opts.timeout };

  if (!isLossy(opts) && !opts.alpha) {
    const { progressive } = await inspectImage(input);
    const data = await compressPng({ kind: "encoded", input, progressive }, compressOpts);
    return { data, paletteSize: null, metric: 0, mode: "lossless" };
  }

  let raster = await decodeImage(input);
  if (opts.alpha) raster = optimizeAlpha(raster);
  const reduced = reducePalette(
    raster,
    {
      lossy: opts.lossy,
      mode: opts.mode,
      lossyFraction: opts.lossyFraction,
      optimizer: opts.optimizer,
      ditherer: opts.ditherer,
      verify: opts.verify,
    },
    deps.quantizer ?? defaultQuantizer
  );
  const source: CompressSource = {
    kind: "raster",
    image: { ...raster, data: reduced.data },
    paletteSize: reduced.paletteSize,
  };
  const data = await compressPng(source, compressOpts);
  return { data, paletteSize: reduced.paletteSize, metric: reduced.metric, mode: reduced.mode };
}

export const optimizeBuffer = (input: Buffer, opts: OptimizeOptions, deps?: OptimizeDeps) =>
  optimizeImage(input, opts, deps);

export async function optimizeFile(
  input: string,
  output: string,
  opts: OptimizeOptions,
  deps: OptimizeDeps = {}
): Promise<FileResult> {
  const before = await fs.stat(input);
  const result = await optimizeImage(input, opts, deps);
  await fs.writeFile(output, result.data);

  // timestamps and mode only survive the lossless path
  if (opts.preserve && !isLossy(opts)) {
    await fs.chmod(output, before.mode);
    await fs.utimes(output, before.atime, before.mtime);
  }
  return {
    input,
    output,
    inputBytes: before.size,
    outputBytes: result.data.length,
    paletteSize: result.paletteSize,
    metric: result.metric,
  };
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/**
 * Optimizes `inputs[i]` into `outputs[i]`, in order. Every input is checked
 * before any file is written; the first failure aborts the batch.
 */
export async function optimizePaths(
  inputs: readonly string[],
  outputs: readonly string[],
  opts: OptimizeOptions,
  deps: OptimizeDeps = {}
): Promise<FileResult[]> {
  const log = deps.log ?? defaultLog;
  if (inputs.length !== outputs.length) {
    throw new ValidationError(`got ${inputs.length} inputs but ${outputs.length} outputs`);
  }
  for (const input of inputs) {
    if (!(await isFile(input))) throw new ValidationError(`input file does not exist: ${input}`);
  }
  for (const dir of new Set(outputs.map((o) => dirname(o)))) await ensureDir(dir);

  const inIdx = opts.verbose ? commonPrefixIndex(inputs) : 0;
  const outIdx = opts.verbose ? commonPrefixIndex(outputs) : 0;

  const results: FileResult[] = [];
  for (let i = 0; i < inputs.length; i++) {
    const r = await optimizeFile(inputs[i], outputs[i], opts, deps);
    results.push(r);
    const line = opts.verbose ? reportLine(r, inIdx, outIdx) : null;
    if (line) log.info({ input: r.input, output: r.output, paletteSize: r.paletteSize }, line);
    else log.debug({ input: r.input, output: r.output, inputBytes: r.inputBytes, outputBytes: r.outputBytes }, "optimize.file");
  }
  return results;
}
