import type { RGBA } from "@pngslim/palette";
import { nearestIndex } from "./nearest.js";

/**
 * Lloyd iterations in RGBA space from the given seeds. Each training color
 * counts `weights[i]` times; a cluster that loses every member keeps its
 * previous centroid.
 */
export function kmeans(colors: RGBA[], weights: ArrayLike<number>, seeds: RGBA[], iterations: number): RGBA[] {
  let centroids = seeds.map((c): RGBA => [c[0], c[1], c[2], c[3]]);
  const labels = new Int32Array(colors.length).fill(-1);

  for (let iter = 0; iter < iterations; iter++) {
    let changed = false;
    const sums = centroids.map(() => [0, 0, 0, 0]);
    const mass = new Float64Array(centroids.length);

    colors.forEach((c, i) => {
      const k = nearestIndex(centroids, c);
      if (labels[i] !== k) { labels[i] = k; changed = true; }
      const w = weights[i];
      for (let ch = 0; ch < 4; ch++) sums[k][ch] += c[ch] * w;
      mass[k] += w;
    });
    if (!changed) break;

    centroids = centroids.map((prev, k): RGBA =>
      mass[k] > 0 ? [sums[k][0] / mass[k], sums[k][1] / mass[k], sums[k][2] / mass[k], sums[k][3] / mass[k]] : prev
    );
  }
  return centroids;
}
