import { UnknownOptionError } from "./errors.js";
import type { Ditherer, DithererName, Optimizer, OptimizerName } from "./types.js";

export const OPTIMIZERS = ["none", "kmeans", "weighted-kmeans"] as const satisfies readonly OptimizerName[];

export const DITHERERS = [
  "none",
  "ordered",
  "floyd-steinberg",
  "floyd-steinberg-vanilla",
  "floyd-steinberg-checkered",
] as const satisfies readonly DithererName[];

const KMEANS_ITERATIONS = 16;

export function isOptimizerName(s: string): s is OptimizerName {
  return (OPTIMIZERS as readonly string[]).includes(s);
}

export function isDithererName(s: string): s is DithererName {
  return (DITHERERS as readonly string[]).includes(s);
}

export function parseOptimizer(name: string): Optimizer {
  const key = name.trim().toLowerCase();
  if (!isOptimizerName(key)) throw new UnknownOptionError("optimizer", name, OPTIMIZERS);
  switch (key) {
    case "none":
      return { kind: "none" };
    case "kmeans":
      return { kind: "kmeans", weighted: false, iterations: KMEANS_ITERATIONS };
    case "weighted-kmeans":
      return { kind: "kmeans", weighted: true, iterations: KMEANS_ITERATIONS };
  }
}

export function parseDitherer(name: string): Ditherer {
  const key = name.trim().toLowerCase();
  if (!isDithererName(key)) throw new UnknownOptionError("ditherer", name, DITHERERS);
  switch (key) {
    case "none":
      return { kind: "none" };
    case "ordered":
      return { kind: "ordered", matrix: 4 };
    case "floyd-steinberg":
      return { kind: "floyd-steinberg", diffusion: 7 / 8, checkered: false };
    case "floyd-steinberg-vanilla":
      return { kind: "floyd-steinberg", diffusion: 1, checkered: false };
    case "floyd-steinberg-checkered":
      return { kind: "floyd-steinberg", diffusion: 7 / 8, checkered: true };
  }
}

export const NO_DITHER: Ditherer = { kind: "none" };
