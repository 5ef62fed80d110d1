import { Worker, type Job } from "bullmq";
import { loadConfig } from "@pngslim/config";
import { createLogger } from "@pngslim/log";
import { OPTIMIZE_QUEUE, redisConnection, type OptimizeJobData, type OptimizeJobResult } from "@pngslim/pipeline";
import { optimizeProcessor } from "./processors/optimize.js";

const log = createLogger("@workers/optimize");
const config = loadConfig();

export const optimizeWorker = new Worker<OptimizeJobData, OptimizeJobResult>(
  OPTIMIZE_QUEUE,
  async (job: Job<OptimizeJobData, OptimizeJobResult>) => {
    log.info({ jobId: job.id, input: job.data.input }, "optimize: job received");
    const result = await optimizeProcessor(job.data);
    log.info({ jobId: job.id, files: result.files.length }, "optimize: job completed");
    return result;
  },
  { connection: redisConnection(config.redisUrl), concurrency: config.workerConcurrency }
);

optimizeWorker.on("ready", () => log.info({ concurrency: config.workerConcurrency }, "optimize: worker ready"));
optimizeWorker.on("failed", (job, err) => {
  log.error({ jobId: job?.id, input: job?.data.input, err }, "optimize: job failed");
});
optimizeWorker.on("closed", () => log.warn("optimize: worker closed"));
