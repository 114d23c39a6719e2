import { StoreUnavailableError } from "../errors.js";
import { log } from "../logger.js";
import type { KeyValueStore } from "../store/key-value-store.js";
import { keys } from "../store/keys.js";

/**
 * Response cache keyed by the client's request_id.
 *
 * Entries hold the exact serialized response body, so a replay is
 * byte-identical to the original. Dedup is best effort: if populating the
 * cache fails, a retry of the same request_id publishes again.
 */
export class IdempotencyCache {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly defaultTtlSeconds: number
  ) {}

  /**
   * Cached response body for `requestId`, or null on a miss.
   *
   * @throws StoreUnavailableError if the store can't be read
   */
  async lookup(requestId: string): Promise<string | null> {
    try {
      const cached = await this.kv.get(keys.idempotent(requestId));
      if (cached !== null) {
        log.idempotency.info({ requestId }, "cache hit");
      }
      return cached;
    } catch (error) {
      throw new StoreUnavailableError("idempotency lookup", error);
    }
  }

  /**
   * Cache the response returned for `requestId`. Never throws: the side
   * effect has already happened, so a failure here is logged and swallowed.
   *
   * @returns whether the entry was written
   */
  async store(
    requestId: string,
    serializedResponse: string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<boolean> {
    try {
      await this.kv.set(keys.idempotent(requestId), serializedResponse, ttlSeconds);
      return true;
    } catch (error) {
      log.idempotency.error({
        requestId,
        error: error instanceof Error ? error.message : String(error),
      }, "Failed to cache idempotent response, retries will not be deduplicated");
      return false;
    }
  }
}
