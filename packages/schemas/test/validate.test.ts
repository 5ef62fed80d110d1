import { describe, it, expect } from "vitest";

// ⬇️ Import from source so tests always reflect latest code
import { DEFAULT_OPTIONS, parseOptimizeJob, parseOptimizeOptions, validateOptimizeOptions } from "../src/index.js";
import { UnknownOptionError, ValidationError } from "@pngslim/palette";

describe("OptimizeOptions schema", () => {
  it("fills defaults for an empty payload", () => {
    const opts = parseOptimizeOptions({});
    expect(opts).toEqual({
      level: 2,
      lossy: 0,
      mode: "bisect",
      optimizer: "kmeans",
      ditherer: "ordered",
      strip: "all",
      alpha: false,
      interlace: "off",
      fast: false,
      verify: false,
      preserve: true,
      recursive: true,
      verbose: true,
    });
    expect(DEFAULT_OPTIONS.level).toBe(2);
  });

  it("rejects a level outside 0..6", () => {
    expect(() => parseOptimizeOptions({ level: 7 })).toThrow(ValidationError);
    expect(() => parseOptimizeOptions({ level: -1 })).toThrow(ValidationError);
    expect(validateOptimizeOptions({ level: 7 })).toBe(false);
    expect(validateOptimizeOptions.errors?.[0]?.instancePath).toBe("/level");
  });

  it("rejects a negative budget and keeps Ajv's details", () => {
    let caught: unknown;
    try {
      parseOptimizeOptions({ lossy: -0.5 });
    } catch (e) {
      caught = e;
    }
    if (!(caught instanceof ValidationError)) throw new Error("expected a ValidationError");
    expect(caught.code).toBe("VALIDATION_ERROR");
    expect(caught.statusCode).toBe(400);
    expect(caught.details).toEqual([{ message: "must be >= 0", instancePath: "/lossy", keyword: "minimum" }]);
  });

  it("rejects unknown keys", () => {
    expect(() => parseOptimizeOptions({ colours: 16 })).toThrow(ValidationError);
  });

  it("reports unknown strategy names as UnknownOptionError", () => {
    expect(() => parseOptimizeOptions({ optimizer: "octree" })).toThrow(UnknownOptionError);
    expect(() => parseOptimizeOptions({ ditherer: "atkinson" })).toThrow(UnknownOptionError);
  });

  it("normalises strategy name case", () => {
    const opts = parseOptimizeOptions({ optimizer: "Weighted-KMeans", ditherer: "FLOYD-STEINBERG" });
    expect(opts.optimizer).toBe("weighted-kmeans");
    expect(opts.ditherer).toBe("floyd-steinberg");
  });

  it("requires lossyFraction in coverage mode", () => {
    expect(() => parseOptimizeOptions({ mode: "coverage" })).toThrow(/lossyFraction/);
    expect(parseOptimizeOptions({ mode: "coverage", lossyFraction: 0.05 }).lossyFraction).toBe(0.05);
  });

  it("coerces query-string values when asked", () => {
    const opts = parseOptimizeOptions({ level: "4", lossy: "2.5", alpha: "true" }, { coerce: true });
    expect(opts.level).toBe(4);
    expect(opts.lossy).toBe(2.5);
    expect(opts.alpha).toBe(true);
    expect(() => parseOptimizeOptions({ level: "4" })).toThrow(ValidationError);
  });

  it("does not mutate the caller's object", () => {
    const input = { level: 3 };
    parseOptimizeOptions(input);
    expect(input).toEqual({ level: 3 });
  });
});

describe("OptimizeJob schema", () => {
  it("accepts one path or a list", () => {
    expect(parseOptimizeJob({ input: "a.png" })).toEqual({ input: "a.png" });
    expect(parseOptimizeJob({ input: ["a.png", "b.png"], output: "out", options: { lossy: 2 } }).output).toBe("out");
  });

  it("rejects a missing or empty input", () => {
    expect(() => parseOptimizeJob({})).toThrow(ValidationError);
    expect(() => parseOptimizeJob({ input: [] })).toThrow(ValidationError);
    expect(() => parseOptimizeJob({ input: "" })).toThrow(ValidationError);
    expect(() => parseOptimizeJob("a.png")).toThrow(ValidationError);
  });

  it("rejects unknown keys", () => {
    expect(() => parseOptimizeJob({ input: "a.png", priority: 1 })).toThrow(ValidationError);
  });
});
