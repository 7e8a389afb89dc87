import path from "path";

export type AppConfig = {
  dataDir: string;
  // Unset means reload is open; matches the x-api-token header otherwise.
  apiToken: string | null;
  cache: {
    // Unset host means local-only caching.
    redisHost: string | null;
    redisPort: number;
    redisDb: number;
    ttlSeconds: number;
    timeoutMs: number;
  };
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string) {
  const value = env[name]?.trim();
  return value ? value : null;
}

/**
 * Integer env var with a fallback. A malformed value is reported and
 * replaced by the fallback so a typo never blocks startup.
 */
function readInt(env: Env, name: string, fallback: number, min: number) {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`config: ${name}="${raw}" is not an integer >= ${min}; using ${fallback}`);
    return fallback;
  }
  return value;
}

export function readConfig(env: Env = process.env, cwd = process.cwd()): AppConfig {
  return {
    dataDir: path.resolve(cwd, readString(env, "DATA_DIR") || "data"),
    apiToken: readString(env, "API_TOKEN"),
    cache: {
      redisHost: readString(env, "CACHE_REDIS_HOST"),
      redisPort: readInt(env, "CACHE_REDIS_PORT", 6379, 1),
      redisDb: readInt(env, "CACHE_REDIS_DB", 0, 0),
      ttlSeconds: readInt(env, "CACHE_TTL_SECONDS", 3600, 1),
      timeoutMs: readInt(env, "CACHE_TIMEOUT_MS", 250, 1),
    },
  };
}
