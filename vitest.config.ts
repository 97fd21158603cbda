import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import packageJson from "./package.json" with { type: "json" };

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    slowTestThreshold: 5_000,
    testTimeout: 20_000,
  },
  resolve: {
    alias: {
      "sts-autorefresh": fileURLToPath(new URL("./src/index.ts", import.meta.url)),
    },
  },
  define: {
    __STS_AUTOREFRESH_VERSION__: JSON.stringify(packageJson.version), // also set in tsup.config.ts
  },
});
