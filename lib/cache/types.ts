/**
 * One cache store. Values are serialized strings; the manager owns JSON.
 * `invalidate` removes the exact key and every key that starts with it.
 */
export type CacheBackend = {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  invalidate(keyOrPrefix: string): Promise<number>;
  ping(): Promise<boolean>;
};

export type CacheLookup = { hit: true; value: unknown } | { hit: false };

export type CacheBackendInfo = {
  backendName: string;
  reachable: boolean;
  fallbackName: string;
};
