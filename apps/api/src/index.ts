// apps/api/src/index.ts
import "dotenv/config";
import { loadConfig } from "@pngslim/config";
import { createLogger } from "@pngslim/log";
import { createApp } from "./app.js";

const log = createLogger("@api");

if (process.env.NODE_ENV !== "test") {
  const config = loadConfig();
  const app = createApp(config);
  app.listen(config.port, () => {
    log.info({ port: config.port }, `API http://localhost:${config.port}`);
  });
}
