import { Redis } from "ioredis";
import type { CacheBackend } from "@/lib/cache/types";

export type RedisConnectionConfig = {
  host: string;
  port: number;
  db: number;
  connectTimeoutMs: number;
};

// Escape glob metacharacters so a prefix is matched literally by SCAN MATCH.
function escapeMatchPattern(value: string) {
  return value.replace(/[*?[\]\\]/g, (ch) => `\\${ch}`);
}

/**
 * Client tuned for an advisory cache: no offline queue (a command on a dead
 * connection fails at once instead of waiting), one retry per request, and a
 * lazy connect so construction never blocks startup.
 */
export function createRedisClient(config: RedisConnectionConfig) {
  const client = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    connectTimeout: config.connectTimeoutMs,
    retryStrategy: (times) => Math.min(times * 500, 5000),
  });

  let lastErrorLogAt = 0;
  client.on("error", (err: Error) => {
    const now = Date.now();
    if (now - lastErrorLogAt < 30_000) return;
    lastErrorLogAt = now;
    console.warn(`redis ${config.host}:${config.port} error: ${err.message}`);
  });

  return client;
}

export class RedisCacheBackend implements CacheBackend {
  readonly name = "redis";
  private readonly client: Redis;
  private connecting: Promise<void> | null = null;

  constructor(client: Redis) {
    this.client = client;
  }

  private async ready() {
    // "wait" before the first connect, "end" after retries gave up.
    if (this.client.status !== "wait" && this.client.status !== "end") return;
    if (!this.connecting) {
      this.connecting = this.client.connect().finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  async get(key: string) {
    await this.ready();
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number) {
    await this.ready();
    if (ttlSeconds <= 0) {
      await this.client.del(key);
      return;
    }
    await this.client.set(key, value, "EX", ttlSeconds);
  }

  async invalidate(keyOrPrefix: string) {
    await this.ready();
    const pattern = `${escapeMatchPattern(keyOrPrefix)}*`;
    let cursor = "0";
    let removed = 0;
    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", pattern, "COUNT", 200);
      cursor = next;
      if (keys.length > 0) {
        removed += await this.client.del(...keys);
      }
    } while (cursor !== "0");
    return removed;
  }

  async ping() {
    await this.ready();
    return (await this.client.ping()) === "PONG";
  }

  async close() {
    if (this.client.status === "ready") {
      await this.client.quit();
      return;
    }
    this.client.disconnect();
  }
}
