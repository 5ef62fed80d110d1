import { describe, it, expect, vi } from "vitest";
import {
  ClusteringError, UnknownOptionError, ValidationError, countUniqueColors, deltaE, reducePalette, rgbToLab,
  NO_DITHER, searchPaletteSize, type PaletteQuantizer, type RGBA,
} from "../src/index.js";
import { BLACK, BLUE, RED, WHITE, firstSeenQuantize, firstSeenQuantizer, image, runs } from "./helpers.js";

function spyQuantizer() {
  const quantize = vi.fn(firstSeenQuantize);
  const quantizer: PaletteQuantizer = { quantize };
  return { quantize, quantizer };
}

describe("searchPaletteSize", () => {
  it("converges on the exact color count at budget 0", () => {
    const img = image([BLACK, WHITE, RED, BLUE], 2);
    const r = searchPaletteSize(img, { lossy: 0 }, firstSeenQuantizer);
    expect(r.paletteSize).toBe(4);
    expect(r.metric).toBe(0);
    expect(r.mode).toBe("bisect");
    expect(r.steps.map((s) => [s.size, s.accepted])).toEqual([[2, false], [3, false]]);
    expect(Array.from(r.data)).toEqual(Array.from(img.data));
  });

  it("needs one color for a flat image", () => {
    const img = image(runs([RED, 10_000]), 100);
    const r = searchPaletteSize(img, { lossy: 1 }, firstSeenQuantizer);
    expect(r.paletteSize).toBe(1);
    expect(r.steps).toEqual([]);
  });

  it("settles on 256 when even the largest palette misses the budget", () => {
    const flat: PaletteQuantizer = {
      quantize: (data) => ({ palette: [BLACK], indices: new Uint8Array(data.length / 4) }),
    };
    const r = searchPaletteSize(image([BLACK, WHITE], 2), { lossy: 1 }, flat);
    expect(r.paletteSize).toBe(256);
    expect(r.metric).toBe(deltaE(rgbToLab(0, 0, 0), rgbToLab(255, 255, 255)));
  });

  it("reports no palette for an empty image", () => {
    const { quantize, quantizer } = spyQuantizer();
    const r = searchPaletteSize({ data: new Uint8Array(0), width: 0, height: 0 }, { lossy: 2 }, quantizer);
    expect(r).toMatchObject({ paletteSize: null, metric: 0, steps: [] });
    expect(quantize).not.toHaveBeenCalled();
  });

  it("quantizes once per measured size plus the final render", () => {
    const { quantize, quantizer } = spyQuantizer();
    searchPaletteSize(image([BLACK, WHITE, RED, BLUE], 2), { lossy: 0 }, quantizer);
    const sizes = quantize.mock.calls.map((c) => c[2]);
    expect(sizes).toEqual([256, 2, 3, 4, 4]);
  });

  it("dithers only the final re-clustering in bisect mode", () => {
    const { quantize, quantizer } = spyQuantizer();
    searchPaletteSize(image([BLACK, WHITE, RED, BLUE], 2), { lossy: 0, ditherer: "floyd-steinberg" }, quantizer);
    expect(quantize.mock.calls.map((c) => [c[2], c[4]])).toEqual([
      [256, NO_DITHER],
      [2, NO_DITHER],
      [3, NO_DITHER],
      [4, { kind: "floyd-steinberg", diffusion: 7 / 8, checkered: false }],
      [4, NO_DITHER],
    ]);
  });

  it("clusters once without dither in the remap modes", () => {
    const img = image(runs([BLACK, 50], [RED, 30], [BLUE, 20]), 10);
    for (const opts of [
      { lossy: 0, mode: "coverage", lossyFraction: 0.2, ditherer: "ordered" },
      { lossy: 3, mode: "prune", ditherer: "floyd-steinberg-checkered" },
    ] as const) {
      const { quantize, quantizer } = spyQuantizer();
      searchPaletteSize(img, opts, quantizer);
      expect(quantize.mock.calls.map((c) => [c[2], c[4]])).toEqual([[256, NO_DITHER]]);
    }
  });

  it("covers the requested share of pixels in coverage mode", () => {
    const NEAR_RED: RGBA = [250, 0, 0, 255];
    const img = image(runs([BLACK, 50], [RED, 30], [NEAR_RED, 15], [BLUE, 5]), 10);
    const r = searchPaletteSize(img, { lossy: 0, mode: "coverage", lossyFraction: 0.25 }, firstSeenQuantizer);
    expect(r.mode).toBe("coverage");
    expect(r.paletteSize).toBe(2);
    expect(r.metric).toBe(0);
    expect(countUniqueColors(r.data)).toBe(2);
    expect(Array.from(r.data.subarray(80 * 4, 81 * 4))).toEqual(RED);
    expect(Array.from(r.data.subarray(95 * 4, 96 * 4))).toEqual(BLACK);
  });

  it("keeps more entries as the lossy fraction drops, always covering the target", () => {
    const NEAR_RED: RGBA = [250, 0, 0, 255];
    const img = image(runs([BLACK, 50], [RED, 30], [NEAR_RED, 15], [BLUE, 5]), 10);
    const fractions = [0.9, 0.5, 0.3, 0.2, 0.1, 0];
    const results = fractions.map((f) =>
      searchPaletteSize(img, { lossy: 0, mode: "coverage", lossyFraction: f }, firstSeenQuantizer));
    expect(results.map((r) => r.paletteSize)).toEqual([1, 1, 2, 2, 3, 4]);
    results.forEach((r, i) => {
      let unchanged = 0;
      for (let o = 0; o < img.data.length; o += 4) {
        if (img.data.subarray(o, o + 4).every((v, ch) => v === r.data[o + ch])) unchanged++;
      }
      expect(unchanged).toBeGreaterThanOrEqual(Math.ceil((1 - fractions[i]) * 100));
      expect(r.metric).toBe(0);
    });
  });

  it("keeps every used entry when pruning at budget 0", () => {
    const GRAY: RGBA = [254, 254, 254, 255];
    const img = image(runs([BLACK, 50], [WHITE, 30], [GRAY, 20]), 10);
    const exact = searchPaletteSize(img, { lossy: 0, mode: "prune" }, firstSeenQuantizer);
    expect(exact.paletteSize).toBe(3);
    expect(Array.from(exact.data)).toEqual(Array.from(img.data));

    const loose = searchPaletteSize(img, { lossy: 1, mode: "prune" }, firstSeenQuantizer);
    expect(loose.paletteSize).toBe(2);
    expect(loose.metric).toBe(deltaE(rgbToLab(254, 254, 254), rgbToLab(255, 255, 255)));
    expect(loose.steps.map((s) => s.size)).toEqual([2, 1]);
    expect(Array.from(loose.data.subarray(99 * 4, 100 * 4))).toEqual(WHITE);
  });

  it("prunes rare entries close to a kept one", () => {
    const NEAR_RED: RGBA = [250, 0, 0, 255];
    const NEAR_BLACK: RGBA = [5, 5, 5, 255];
    const img = image(runs([BLACK, 50], [RED, 30], [NEAR_RED, 15], [NEAR_BLACK, 5]), 10);
    const r = searchPaletteSize(img, { lossy: 5, mode: "prune" }, firstSeenQuantizer);
    expect(r.mode).toBe("prune");
    expect(r.paletteSize).toBe(2);
    expect(r.metric).toBe(Math.max(
      deltaE(rgbToLab(255, 0, 0), rgbToLab(250, 0, 0)),
      deltaE(rgbToLab(0, 0, 0), rgbToLab(5, 5, 5))
    ));
    expect(countUniqueColors(r.data)).toBe(2);
  });
});

describe("reducePalette", () => {
  it("leaves pixels untouched at budget 0", () => {
    const { quantize, quantizer } = spyQuantizer();
    const img = image([BLACK, WHITE], 2);
    const r = reducePalette(img, { lossy: 0 }, quantizer);
    expect(r).toEqual({ data: img.data, paletteSize: null, metric: 0, mode: "lossless", steps: [] });
    expect(quantize).not.toHaveBeenCalled();
  });

  it("gates coverage mode on lossyFraction", () => {
    const img = image([BLACK, WHITE], 2);
    expect(reducePalette(img, { lossy: 3, mode: "coverage", lossyFraction: 0 }, firstSeenQuantizer).mode).toBe("lossless");
    expect(reducePalette(img, { lossy: 0, mode: "coverage", lossyFraction: 0.5 }, firstSeenQuantizer).mode).toBe("coverage");
  });

  it("validates before any quantization", () => {
    const { quantize, quantizer } = spyQuantizer();
    const img = image([BLACK, WHITE], 2);
    expect(() => reducePalette(img, { lossy: -1 }, quantizer)).toThrow(ValidationError);
    expect(() => reducePalette(img, { lossy: Number.NaN }, quantizer)).toThrow(ValidationError);
    expect(() => reducePalette({ ...img, width: 3 }, { lossy: 1 }, quantizer)).toThrow(ValidationError);
    expect(() => reducePalette(img, { lossy: 1, mode: "coverage" }, quantizer)).toThrow(ValidationError);
    expect(() => reducePalette(img, { lossy: 1, maxSamples: 0 }, quantizer)).toThrow(ValidationError);
    expect(() => reducePalette(img, { lossy: 1, lossyFraction: 2 }, quantizer)).toThrow(ValidationError);
    expect(quantize).not.toHaveBeenCalled();
  });

  it("rejects unknown strategy names before any quantization", () => {
    const { quantize, quantizer } = spyQuantizer();
    const img = image([BLACK, WHITE], 2);
    expect(() => reducePalette(img, { lossy: 1, ditherer: "atkinson" }, quantizer)).toThrow(UnknownOptionError);
    expect(() => reducePalette(img, { lossy: 1, optimizer: "octree" }, quantizer)).toThrow(UnknownOptionError);
    expect(quantize).not.toHaveBeenCalled();
  });

  it("wraps quantizer failures as ClusteringError", () => {
    const broken: PaletteQuantizer = {
      quantize: () => { throw new Error("out of memory"); },
    };
    let caught: unknown;
    try {
      reducePalette(image([BLACK, WHITE], 2), { lossy: 1 }, broken);
    } catch (e) {
      caught = e;
    }
    if (!(caught instanceof ClusteringError)) throw new Error("expected a ClusteringError");
    expect(caught.statusCode).toBe(500);
    expect(caught.context).toEqual({ operation: "quantize", targetSize: 256 });
    expect(caught.message).toBe("quantization to 256 colors failed: out of memory");
  });
});
