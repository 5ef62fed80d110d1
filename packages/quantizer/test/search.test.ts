import { describe, it, expect } from "vitest";
import { countUniqueColors, reducePalette, searchPaletteSize, type PixelImage, type RGBA } from "@pngslim/palette";
import { defaultQuantizer } from "../src/index.js";

function image(colors: RGBA[], width: number): PixelImage {
  const data = new Uint8Array(colors.length * 4);
  colors.forEach((c, i) => data.set(c, i * 4));
  return { data, width, height: colors.length / width };
}

const four = () => image([[0, 0, 0, 255], [255, 255, 255, 255], [255, 0, 0, 255], [0, 0, 255, 255]], 2);
const ramp = () => image(Array.from({ length: 64 }, (_, i): RGBA => [i * 4, i * 4, i * 4, 255]), 8);

describe("palette search with the built-in quantizer", () => {
  it("keeps all four colors of a 2x2 image at budget 0", () => {
    const r = searchPaletteSize(four(), { lossy: 0 }, defaultQuantizer);
    expect(r.paletteSize).toBe(4);
    expect(r.metric).toBe(0);
    expect(Array.from(r.data)).toEqual(Array.from(four().data));
  });

  it("needs a single color for a flat 100x100 image", () => {
    const flat = image(Array.from({ length: 10_000 }, (): RGBA => [12, 34, 56, 255]), 100);
    const r = reducePalette(flat, { lossy: 2 }, defaultQuantizer);
    expect(r.paletteSize).toBe(1);
    expect(countUniqueColors(r.data)).toBe(1);
  });

  it("shrinks a gray ramp within budget", () => {
    const r = reducePalette(ramp(), { lossy: 5, optimizer: "weighted-kmeans", ditherer: "none" }, defaultQuantizer);
    expect(r.paletteSize).toBeGreaterThan(1);
    expect(r.paletteSize).toBeLessThan(64);
    expect(r.metric).toBeLessThanOrEqual(5);
    expect(countUniqueColors(r.data)).toBeLessThanOrEqual(r.paletteSize ?? 0);
  });

  it("never ends larger after the verify pass", () => {
    const plain = reducePalette(ramp(), { lossy: 5 }, defaultQuantizer);
    const verified = reducePalette(ramp(), { lossy: 5, verify: true }, defaultQuantizer);
    expect(verified.paletteSize ?? 0).toBeLessThanOrEqual(plain.paletteSize ?? 0);
    expect(verified.metric).toBeLessThanOrEqual(5);
  });

  it("is repeatable", () => {
    const a = reducePalette(ramp(), { lossy: 3, ditherer: "floyd-steinberg" }, defaultQuantizer);
    const b = reducePalette(ramp(), { lossy: 3, ditherer: "floyd-steinberg" }, defaultQuantizer);
    expect(a).toEqual(b);
  });
});
