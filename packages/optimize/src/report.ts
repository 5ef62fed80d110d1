const UNITS = ["B", "KB", "MB", "GB", "TB", "PB"] as const;

/** 1024-based, one decimal: `12.3 KB`. Zero prints as `0 B`. */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";
  let i = 0;
  let s = bytes;
  while (s >= 1024 && i < UNITS.length - 1) {
    s /= 1024;
    i++;
  }
  return `${s.toFixed(1)} ${UNITS[i]}`;
}

const isSep = (ch: string) => ch === "/" || ch === "\\";

/**
 * Length of the longest directory prefix (ending in a separator) shared
 * by every path. A single path strips its own directory.
 */
export function commonPrefixIndex(paths: readonly string[]): number {
  if (paths.length === 0) return 0;
  const first = paths[0];
  let lastSep = -1;
  for (let i = first.length - 1; i >= 0; i--) {
    if (isSep(first[i])) { lastSep = i; break; }
  }
  if (lastSep < 0) return 0;
  if (paths.length === 1) return lastSep + 1;

  let idx = 0;
  for (let pos = 0; pos <= lastSep; pos++) {
    const ch = first[pos];
    if (!paths.every((p) => p[pos] === ch)) return idx;
    if (isSep(ch)) idx = pos + 1;
  }
  return idx;
}

export function truncatePath(path: string, index: number): string {
  return index === 0 || index >= path.length ? path : path.slice(index);
}

export type ReportEntry = {
  input: string;
  output: string;
  inputBytes: number;
  outputBytes: number;
};

/**
 * `a.png | 12.3 KB -> 8.1 KB (-34.1%)`, or `a.png -> b.png | ...` when
 * written elsewhere. null for an empty input.
 */
export function reportLine(entry: ReportEntry, inputIndex = 0, outputIndex = 0): string | null {
  const { input, output, inputBytes, outputBytes } = entry;
  if (inputBytes <= 0) return null;
  const change = ((inputBytes - outputBytes) / inputBytes) * 100;
  const sign = outputBytes < inputBytes ? "-" : "+";
  const shownOutput = truncatePath(output, outputIndex);
  const shown = input === output ? shownOutput : `${truncatePath(input, inputIndex)} -> ${shownOutput}`;
  return `${shown} | ${formatBytes(inputBytes)} -> ${formatBytes(outputBytes)} (${sign}${Math.abs(change).toFixed(1)}%)`;
}
