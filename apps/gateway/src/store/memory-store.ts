import type { KeyValueStore } from "./key-value-store.js";

interface Entry {
  value: string;
  /** Epoch ms, null for no expiry */
  expiresAt: number | null;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
}

/**
 * In-process KeyValueStore with Redis TTL semantics (for testing).
 *
 * Time comes from an injectable clock so tests can cross window and TTL
 * boundaries without waiting.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async incrementWithExpiry(key: string, windowSeconds: number): Promise<number> {
    const entry = this.live(key);
    const count = (entry ? Number(entry.value) : 0) + 1;

    this.entries.set(key, {
      value: String(count),
      expiresAt: entry?.expiresAt ?? this.now() + windowSeconds * 1000,
    });

    return count;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return [...this.entries.keys()].filter((key) => matcher.test(key) && this.live(key) !== undefined);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** Number of live keys (for assertions) */
  size(): number {
    return [...this.entries.keys()].filter((key) => this.live(key) !== undefined).length;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
