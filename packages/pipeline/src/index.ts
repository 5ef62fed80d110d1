export {
  OPTIMIZE_QUEUE, OPTIMIZE_JOB_OPTS, optimizeQueue, redisConnection,
  type OptimizeJobData, type OptimizeJobResult,
} from "./queue.js";
