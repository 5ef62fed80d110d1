import type { RGBA } from "@pngslim/palette";

type Box = number[]; // indices into the color list

function widestChannel(colors: RGBA[], box: Box): { channel: number; range: number } {
  let best = { channel: 0, range: -1 };
  for (let ch = 0; ch < 4; ch++) {
    let lo = Infinity, hi = -Infinity;
    for (const i of box) {
      const v = colors[i][ch];
      if (v < lo) lo = v;
      if (v > hi) hi = v;
    }
    if (hi - lo > best.range) best = { channel: ch, range: hi - lo };
  }
  return best;
}

/**
 * Weighted median cut over RGBA. Splits the box with the widest channel
 * at its weighted median until `target` boxes exist or nothing splits.
 * Returns the weighted mean of each box.
 */
export function medianCut(colors: RGBA[], weights: ArrayLike<number>, target: number): RGBA[] {
  if (colors.length === 0) return [];
  let boxes: Box[] = [colors.map((_, i) => i)];

  while (boxes.length < target) {
    let pick = -1;
    let pickChannel = 0;
    let pickRange = 0;
    boxes.forEach((box, bi) => {
      if (box.length < 2) return;
      const { channel, range } = widestChannel(colors, box);
      if (range > pickRange) { pick = bi; pickChannel = channel; pickRange = range; }
    });
    if (pick < 0) break;

    const box = boxes[pick].slice().sort((a, b) => colors[a][pickChannel] - colors[b][pickChannel] || a - b);
    let total = 0;
    for (const i of box) total += weights[i];
    let acc = 0;
    let cut = 1;
    for (let k = 0; k < box.length - 1; k++) {
      acc += weights[box[k]];
      cut = k + 1;
      if (acc * 2 >= total) break;
    }
    boxes = [...boxes.slice(0, pick), box.slice(0, cut), box.slice(cut), ...boxes.slice(pick + 1)];
  }

  return boxes.map((box) => {
    const sum = [0, 0, 0, 0];
    let w = 0;
    for (const i of box) {
      for (let ch = 0; ch < 4; ch++) sum[ch] += colors[i][ch] * weights[i];
      w += weights[i];
    }
    return [sum[0] / w, sum[1] / w, sum[2] / w, sum[3] / w];
  });
}
