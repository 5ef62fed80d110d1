// packages/adapters/src/compress.ts
import sharp from "sharp";
import { createLogger } from "@pngslim/log";
import { CompressionError, PngslimError } from "@pngslim/palette";
import { rasterToSharp, type RasterImage } from "./codec.js";

const log = createLogger("@adapters/compress");

export type StripMode = "safe" | "all" | "none";
export type InterlaceMode = "off" | "on" | "keep";

export type CompressOptions = {
  level: number;            // 0..6
  strip: StripMode;
  interlace: InterlaceMode;
  fast: boolean;
  timeout?: number;         // seconds
};

export type CompressSource =
  /** Untouched pixels: re-encoded straight from the original bytes. */
  | { kind: "encoded"; input: string | Buffer; progressive: boolean }
  /** Rewritten pixels; `paletteSize` set when they fit an indexed PNG. */
  | { kind: "raster"; image: RasterImage; paletteSize: number | null };

export type PngEncoding = {
  compressionLevel: number;
  adaptiveFiltering: boolean;
  effort: number;
  progressive: boolean;
  palette: boolean;
  colours?: number;
};

/** Maps the 0..6 optimisation level onto sharp's PNG knobs. */
export function pngEncoding(opts: CompressOptions, progressiveSource: boolean, paletteSize: number | null): PngEncoding {
  const compressionLevel = Math.min(9, Math.round(opts.level * 1.5));
  const effort = Math.min(10, 1 + compressionLevel);
  const indexed = paletteSize !== null && paletteSize >= 1 && paletteSize <= 256;
  return {
    compressionLevel,
    adaptiveFiltering: opts.level >= 3,
    effort: opts.fast ? Math.max(1, Math.floor(effort / 2)) : effort,
    progressive: opts.interlace === "on" || (opts.interlace === "keep" && progressiveSource),
    palette: indexed,
    ...(indexed ? { colours: Math.max(2, paletteSize) } : {}),
  };
}

function applyStrip(img: sharp.Sharp, strip: StripMode): sharp.Sharp {
  if (strip === "none") return img.keepMetadata();
  if (strip === "safe") return img.keepIccProfile();
  return img; // sharp drops metadata unless asked to keep it
}

function pngOptions(enc: PngEncoding): sharp.PngOptions {
  return { ...enc, ...(enc.palette ? { quality: 100, dither: 0 } : {}) };
}

/** The PNG decodes to exactly the raster's RGBA bytes. */
async function reproduces(png: Buffer, image: RasterImage): Promise<boolean> {
  const { data, info } = await sharp(png).ensureAlpha().raw({ depth: "uchar" }).toBuffer({ resolveWithObject: true });
  if (info.channels !== 4 || info.width !== image.width || info.height !== image.height) return false;
  return data.equals(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.length));
}

async function encodeRaster(image: RasterImage, enc: PngEncoding, timeout?: number): Promise<Buffer> {
  const img = rasterToSharp(image);
  return (timeout ? img.timeout({ seconds: timeout }) : img).png(pngOptions(enc)).toBuffer();
}

/**
 * Lossless PNG re-encode. Metadata policy only applies to encoded sources;
 * rewritten rasters carry none. A raster is written indexed only when the
 * indexed file decodes to the same pixels; otherwise it goes out truecolor.
 */
export async function compressPng(src: CompressSource, opts: CompressOptions): Promise<Buffer> {
  if (!Number.isInteger(opts.level) || opts.level < 0 || opts.level > 6) {
    throw new CompressionError(new RangeError(`level must be an integer within [0, 6], got ${opts.level}`));
  }
  const path = src.kind === "encoded" && typeof src.input === "string" ? src.input : undefined;

  try {
    if (src.kind === "encoded") {
      const enc = pngEncoding(opts, src.progressive, null);
      let img = applyStrip(sharp(src.input), opts.strip);
      if (opts.timeout) img = img.timeout({ seconds: opts.timeout });
      const out = await img.png(pngOptions(enc)).toBuffer();
      log.debug({ path, ...enc, bytes: out.length }, "compress.done");
      return out;
    }

    let enc = pngEncoding(opts, src.image.progressive, src.paletteSize);
    let out = await encodeRaster(src.image, enc, opts.timeout);
    if (enc.palette && !(await reproduces(out, src.image))) {
      log.debug({ paletteSize: src.paletteSize }, "compress.palette_mismatch");
      enc = pngEncoding(opts, src.image.progressive, null);
      out = await encodeRaster(src.image, enc, opts.timeout);
    }
    log.debug({ ...enc, bytes: out.length }, "compress.done");
    return out;
  } catch (err) {
    if (err instanceof PngslimError) throw err;
    throw new CompressionError(err, path);
  }
}
