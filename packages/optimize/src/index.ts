import type { OptimizeOptions } from "@pngslim/schemas";
import { resolveInputs, type OutputSpec } from "./inputs.js";
import { optimizePaths, type FileResult, type OptimizeDeps } from "./optimize.js";

export { formatBytes, commonPrefixIndex, truncatePath, reportLine, type ReportEntry } from "./report.js";
export { resolveInputs, listPngFiles, PNG_FILE, type OutputSpec, type ResolvedPaths } from "./inputs.js";
export {
  optimizeImage, optimizeBuffer, optimizeFile, optimizePaths, isLossy,
  type OptimizeDeps, type ImageResult, type FileResult,
} from "./optimize.js";

/** Directory expansion plus batch optimisation in one call. */
export async function optimize(
  input: string | string[],
  output: OutputSpec | undefined,
  opts: OptimizeOptions,
  deps?: OptimizeDeps
): Promise<FileResult[]> {
  const { inputs, outputs } = await resolveInputs(input, output, { recursive: opts.recursive });
  if (inputs.length === 0) return [];
  return optimizePaths(inputs, outputs, opts, deps);
}
