import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const isCI = process.env.CI === "1" || process.env.CI === "true";
const POOLS = ["threads", "forks", "vmThreads", "vmForks"] as const;
type PoolName = (typeof POOLS)[number];
const isPool = (value: string | undefined): value is PoolName => POOLS.some((p) => p === value);
const requestedPool = process.env.VITEST_POOL;
const pool: PoolName = isPool(requestedPool) ? requestedPool : isCI ? "forks" : "threads";

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "desk-gis-engine": fromRoot("./engine/src/index.ts"),
      "desk-gis-ingestion": fromRoot("./ingestion/src/api.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts", "app/src/**/*.test.{ts,tsx}"],
    environmentMatchGlobs: [["app/src/**/*.test.{ts,tsx}", "jsdom"]],
    pool,
    poolOptions: {
      threads: {
        singleThread: isCI,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
    slowTestThreshold: isCI ? 2000 : 1000,
  },
});
