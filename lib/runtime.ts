import { createAnalysisEngine, type AnalysisEngine } from "@/lib/analysis/engine";
import { createCacheManager, type CacheManager } from "@/lib/cache/manager";
import { createRedisClient, RedisCacheBackend } from "@/lib/cache/redisBackend";
import { readConfig, type AppConfig } from "@/lib/config";
import { createDatasetRegistry, type DatasetRegistry } from "@/lib/datasets/registry";

export type Runtime = {
  config: AppConfig;
  cache: CacheManager;
  engine: AnalysisEngine;
  datasets: DatasetRegistry;
};

export function createRuntime(config: AppConfig = readConfig()): Runtime {
  const network = config.cache.redisHost
    ? new RedisCacheBackend(
        createRedisClient({
          host: config.cache.redisHost,
          port: config.cache.redisPort,
          db: config.cache.redisDb,
          connectTimeoutMs: config.cache.timeoutMs,
        })
      )
    : null;

  const cache = createCacheManager({
    network,
    defaultTtlSeconds: config.cache.ttlSeconds,
    timeoutMs: config.cache.timeoutMs,
  });

  return {
    config,
    cache,
    engine: createAnalysisEngine({ cache, ttlSeconds: config.cache.ttlSeconds }),
    datasets: createDatasetRegistry({ dataDir: config.dataDir, cache }),
  };
}

// Kept on globalThis so dev-server module reloads reuse one Redis connection.
declare global {
  // eslint-disable-next-line no-var
  var __ledgerRuntime: Runtime | undefined;
}

export function getRuntime(): Runtime {
  const existing = globalThis.__ledgerRuntime;
  if (existing) return existing;
  const runtime = createRuntime();
  globalThis.__ledgerRuntime = runtime;
  return runtime;
}
