/**
 * Key-value capability behind status records, the idempotency cache and
 * rate-limit counters.
 *
 * Single-key operations are assumed atomic on the backing store; callers do
 * no client-side locking.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;

  /** Set a value with its own time-to-live. */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /**
   * Atomically increment a counter and return the new value. The expiry is
   * set when the increment created the key (result 1), so later increments
   * never extend the window; a counter that somehow has no expiry gets one.
   */
  incrementWithExpiry(key: string, windowSeconds: number): Promise<number>;

  /** Remaining TTL in seconds; -1 without expiry, -2 when the key is absent. */
  ttl(key: string): Promise<number>;

  /** Returns true when a key was removed. */
  delete(key: string): Promise<boolean>;

  /** All keys matching a glob pattern (only `*` is significant). */
  scanKeys(pattern: string): Promise<string[]>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}
