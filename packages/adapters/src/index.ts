export { decodeImage, encodeImage, inspectImage, optimizeAlpha, rasterToSharp, type RasterImage } from "./codec.js";
export {
  compressPng, pngEncoding,
  type CompressOptions, type CompressSource, type PngEncoding, type StripMode, type InterlaceMode,
} from "./compress.js";
