import type { CacheBackend } from "@/lib/cache/types";

type Entry = {
  value: string;
  expiresAt: number;
};

export type MemoryCacheBackendOptions = {
  // Milliseconds since epoch; injectable so tests can move time forward.
  now?: () => number;
};

/** Process-local store. Expiry is checked on read and expired entries are dropped there. */
export class MemoryCacheBackend implements CacheBackend {
  readonly name = "memory";
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;

  constructor(options: MemoryCacheBackendOptions = {}) {
    this.now = options.now || Date.now;
  }

  async get(key: string) {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number) {
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async invalidate(keyOrPrefix: string) {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(keyOrPrefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async ping() {
    return true;
  }

  // Entries still held, expired or not.
  get size() {
    return this.entries.size;
  }
}
