import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*_test.ts"],
    testTimeout: 30_000,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
