export const MAX_SAMPLES = 50_000;

/**
 * Evenly strided pixel positions starting at 0. The stride is the integer
 * quotient `total / maxSamples` (at least 1), so the count may run up to
 * just under twice `maxSamples`. Same inputs, same positions: every search
 * step scores the identical sample.
 */
export function sampleIndices(total: number, maxSamples: number = MAX_SAMPLES): number[] {
  if (total <= 0) return [];
  const stride = Math.max(1, Math.floor(total / Math.max(1, maxSamples)));
  const out: number[] = [];
  for (let i = 0; i < total; i += stride) out.push(i);
  return out;
}
