// packages/adapters/src/codec.ts
import sharp from "sharp";
import { CodecError, type PixelImage } from "@pngslim/palette";

export type RasterImage = PixelImage & {
  /** Source was Adam7-interlaced. */
  progressive: boolean;
};

/** Decodes any sharp-readable image (first frame) to 8-bit sRGB RGBA. */
export async function decodeImage(input: string | Buffer): Promise<RasterImage> {
  const path = typeof input === "string" ? input : undefined;
  try {
    const img = sharp(input);
    const meta = await img.metadata();
    const { data, info } = await img
      .clone()
      .toColourspace("srgb")
      .ensureAlpha()
      .raw({ depth: "uchar" })
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 4) throw new Error(`expected 4 channels, got ${info.channels}`);
    return {
      data: new Uint8Array(data.buffer, data.byteOffset, data.length),
      width: info.width,
      height: info.height,
      progressive: meta.isProgressive ?? false,
    };
  } catch (err) {
    throw new CodecError("decode", err, path);
  }
}

/** Header-only probe; no pixel decode. */
export async function inspectImage(input: string | Buffer): Promise<{ width: number; height: number; progressive: boolean }> {
  try {
    const meta = await sharp(input).metadata();
    if (meta.width === undefined || meta.height === undefined) throw new Error("missing image dimensions");
    return { width: meta.width, height: meta.height, progressive: meta.isProgressive ?? false };
  } catch (err) {
    throw new CodecError("decode", err, typeof input === "string" ? input : undefined);
  }
}

export function rasterToSharp(image: PixelImage): sharp.Sharp {
  return sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.length), {
    raw: { width: image.width, height: image.height, channels: 4 },
  });
}

/** Plain PNG encode of an RGBA raster, no optimisation. */
export async function encodeImage(image: PixelImage): Promise<Buffer> {
  try {
    return await rasterToSharp(image).png().toBuffer();
  } catch (err) {
    throw new CodecError("encode", err);
  }
}

/** Zeroes the color of fully transparent pixels; alpha is untouched. */
export function optimizeAlpha<T extends PixelImage>(image: T): T {
  const data = image.data.slice();
  for (let o = 0; o < data.length; o += 4) {
    if (data[o + 3] === 0) { data[o] = 0; data[o + 1] = 0; data[o + 2] = 0; }
  }
  return { ...image, data };
}
