import { resolveOptimizeOptions } from "@pngslim/config";
import { createLogger } from "@pngslim/log";
import { optimize } from "@pngslim/optimize";
import type { OptimizeJobData, OptimizeJobResult } from "@pngslim/pipeline";

const log = createLogger("@workers/optimize");

export async function optimizeProcessor(data: OptimizeJobData): Promise<OptimizeJobResult> {
  const opts = await resolveOptimizeOptions(data.options ?? {});
  log.info({ input: data.input, output: data.output ?? "<in place>", lossy: opts.lossy, mode: opts.mode }, "optimize start");
  const files = await optimize(data.input, data.output, opts);
  const saved = files.reduce((acc, f) => acc + (f.inputBytes - f.outputBytes), 0);
  log.info({ files: files.length, savedBytes: saved }, "optimize done");
  return { files };
}
