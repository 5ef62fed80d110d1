import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (rel: string) => fileURLToPath(new URL(rel, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
    testTimeout: 20_000,
  },
  resolve: {
    alias: {
      // Use SOURCE for local packages so tests don't depend on dist/
      "@pngslim/log": src("./packages/log/src/index.ts"),
      "@pngslim/config": src("./packages/config/src/index.ts"),
      "@pngslim/schemas": src("./packages/schemas/src/index.ts"),
      "@pngslim/palette": src("./packages/palette/src/index.ts"),
      "@pngslim/quantizer": src("./packages/quantizer/src/index.ts"),
      "@pngslim/adapters": src("./packages/adapters/src/index.ts"),
      "@pngslim/optimize": src("./packages/optimize/src/index.ts"),
      // Mock the pipeline queue to avoid Redis during tests
      "@pngslim/pipeline": src("./apps/api/test/mocks/pipeline.ts"),
    },
  },
});
