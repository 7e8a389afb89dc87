import { MemoryCacheBackend } from "@/lib/cache/memoryBackend";
import { withTimeout } from "@/lib/cache/timeout";
import type { CacheBackend, CacheBackendInfo, CacheLookup } from "@/lib/cache/types";
import { CacheUnavailableError } from "@/lib/errors";

export type CacheManagerOptions = {
  // Networked store; tried first on every call when present.
  network?: CacheBackend | null;
  local?: CacheBackend;
  defaultTtlSeconds?: number;
  timeoutMs?: number;
  logger?: Pick<Console, "warn">;
};

export type CacheManager = {
  get(key: string): Promise<CacheLookup>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  invalidate(keyOrPrefix: string): Promise<number>;
  backendInfo(): Promise<CacheBackendInfo>;
};

type Attempt<T> = { ok: true; value: T } | { ok: false };

const DEFAULT_TTL_SECONDS = 3600;
const DEFAULT_TIMEOUT_MS = 250;

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Advisory cache. Each call tries the network backend (time-boxed) and, when
 * that fails, serves the same call from the local backend. There is no sticky
 * failover state and no method rejects.
 */
export function createCacheManager(options: CacheManagerOptions = {}): CacheManager {
  const network = options.network || null;
  const local = options.local || new MemoryCacheBackend();
  const defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger || console;

  async function onNetwork<T>(op: string, work: (backend: CacheBackend) => Promise<T>): Promise<Attempt<T>> {
    if (!network) return { ok: false };
    try {
      return { ok: true, value: await withTimeout(work(network), timeoutMs, `cache ${op}`) };
    } catch (err: unknown) {
      const unavailable = new CacheUnavailableError(network.name, err);
      logger.warn(`${unavailable.message} ${op} served by ${local.name}: ${errorMessage(err)}`);
      return { ok: false };
    }
  }

  async function onLocal<T>(op: string, work: (backend: CacheBackend) => Promise<T>, fallback: T) {
    try {
      return await work(local);
    } catch (err: unknown) {
      logger.warn(`cache ${op} failed on ${local.name}: ${errorMessage(err)}`);
      return fallback;
    }
  }

  async function get(key: string): Promise<CacheLookup> {
    const fromNetwork = await onNetwork("get", (backend) => backend.get(key));
    const raw = fromNetwork.ok
      ? fromNetwork.value
      : await onLocal("get", (backend) => backend.get(key), null);
    if (raw === null) return { hit: false };

    try {
      const value: unknown = JSON.parse(raw);
      return { hit: true, value };
    } catch {
      logger.warn(`cache get: dropping unreadable entry ${key}`);
      return { hit: false };
    }
  }

  async function set(key: string, value: unknown, ttlSeconds = defaultTtlSeconds) {
    let serialized: string;
    try {
      serialized = JSON.stringify(value);
    } catch (err: unknown) {
      logger.warn(`cache set: value for ${key} is not serializable: ${errorMessage(err)}`);
      return;
    }

    const stored = await onNetwork("set", (backend) => backend.set(key, serialized, ttlSeconds));
    if (stored.ok) return;
    await onLocal("set", (backend) => backend.set(key, serialized, ttlSeconds), undefined);
  }

  async function invalidate(keyOrPrefix: string) {
    // Local entries may have been written while the network store was down,
    // so both stores are cleared.
    const fromNetwork = await onNetwork("invalidate", (backend) => backend.invalidate(keyOrPrefix));
    const fromLocal = await onLocal("invalidate", (backend) => backend.invalidate(keyOrPrefix), 0);
    return (fromNetwork.ok ? fromNetwork.value : 0) + fromLocal;
  }

  async function backendInfo(): Promise<CacheBackendInfo> {
    if (!network) {
      return { backendName: local.name, reachable: true, fallbackName: local.name };
    }
    const pinged = await onNetwork("ping", (backend) => backend.ping());
    return {
      backendName: network.name,
      reachable: pinged.ok && pinged.value,
      fallbackName: local.name,
    };
  }

  return { get, set, invalidate, backendInfo };
}
