import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/unit/**/*.test.ts", "test/routes/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    env: { NODE_ENV: "test", LOG_LEVEL: "info" },
    restoreMocks: true,
    mockReset: true,
    unstubEnvs: true,
    testTimeout: 10_000,
    fileParallelism: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/types.ts", "src/server.ts"],
      thresholds: { lines: 80, branches: 70 }
    }
  }
});
