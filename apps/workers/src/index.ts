// apps/workers/src/index.ts
import "dotenv/config";
import { loadConfig } from "@pngslim/config";
import { createLogger } from "@pngslim/log";

// the worker registers itself on import
import { optimizeWorker } from "./optimize.worker.js";

const logger = createLogger("@workers");
const config = loadConfig();

logger.info({ redis: config.redisUrl, concurrency: config.workerConcurrency }, "Workers started");

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "Workers stopping");
    optimizeWorker.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "worker close failed");
        process.exit(1);
      }
    );
  });
}
