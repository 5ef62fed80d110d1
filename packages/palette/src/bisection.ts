import type { SearchStep } from "./types.js";

export type Bisection = {
  size: number;
  steps: SearchStep[];
};

/**
 * Smallest size in [lo, hi] whose metric passes `budget`, assuming the
 * metric does not grow with size. Falls back to `hi` when nothing below
 * it passes; `hi` itself is never measured.
 */
export function bisect(
  lo: number,
  hi: number,
  measure: (size: number) => number,
  budget: number
): Bisection {
  if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo > hi) {
    throw new RangeError(`bisect: invalid range [${lo}, ${hi}]`);
  }
  const steps: SearchStep[] = [];
  while (lo < hi) {
    const mid = Math.floor((lo + hi) / 2);
    const metric = measure(mid);
    const accepted = metric <= budget;
    steps.push({ size: mid, metric, accepted });
    if (accepted) hi = mid;
    else lo = mid + 1;
  }
  return { size: lo, steps };
}

/**
 * Linear pass below a bisection result: keeps stepping down while the next
 * smaller size still passes. One measurement per size tried.
 */
export function walkDown(
  from: number,
  floor: number,
  measure: (size: number) => number,
  budget: number
): Bisection {
  const steps: SearchStep[] = [];
  let size = from;
  while (size > floor) {
    const metric = measure(size - 1);
    const accepted = metric <= budget;
    steps.push({ size: size - 1, metric, accepted });
    if (!accepted) break;
    size--;
  }
  return { size, steps };
}
