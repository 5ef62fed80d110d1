import { Queue, type JobsOptions } from "bullmq";
import { Redis } from "ioredis";
import { loadConfig } from "@pngslim/config";
import type { FileResult } from "@pngslim/optimize";

export const OPTIMIZE_QUEUE = "optimize";

export type OptimizeJobData = {
  input: string | string[];
  /** Directory or explicit paths; omitted means in place. */
  output?: string | string[];
  /** Raw options; layered over settings and env by the worker. */
  options?: Record<string, unknown>;
};

export type OptimizeJobResult = {
  files: FileResult[];
};

export const OPTIMIZE_JOB_OPTS: JobsOptions = {
  attempts: 1,
  // keep finished jobs a while so clients can poll them
  removeOnComplete: { age: 3600, count: 1000 },
  removeOnFail: { age: 24 * 3600 },
};

/** BullMQ needs maxRetriesPerRequest: null on blocking connections. */
export function redisConnection(url: string = loadConfig().redisUrl): Redis {
  return new Redis(url, { maxRetriesPerRequest: null });
}

let optimizeQ: Queue<OptimizeJobData, OptimizeJobResult> | undefined;

/** Created on first use so importing this module opens no connection. */
export function optimizeQueue(): Queue<OptimizeJobData, OptimizeJobResult> {
  optimizeQ ??= new Queue<OptimizeJobData, OptimizeJobResult>(OPTIMIZE_QUEUE, { connection: redisConnection() });
  return optimizeQ;
}
