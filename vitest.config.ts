// vitest.config.ts
// Test runner configuration for every workspace package

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages run from their TypeScript sources, as under tsc's "sealbox-source" condition
    alias: {
      "@sealbox/shared": fileURLToPath(new URL("./packages/shared/src/index.ts", import.meta.url)),
    },
  },
  test: {
    // Worker spawn plus a deliberate timeout run can take a couple of seconds
    testTimeout: 20_000,
    include: ["packages/*/test/**/*.spec.ts"],
  },
});
