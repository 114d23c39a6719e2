/**
 * Per-caller rate limiter.
 *
 * Fixed window counter: the first request in a window creates the counter and
 * starts its TTL; every request (allowed or not) increments it; the key expires
 * at the window boundary and the budget starts over.
 *
 * Fails open: if the counter store is unreachable the request is allowed.
 */

import { log } from "../logger.js";
import type { KeyValueStore } from "../store/key-value-store.js";
import { keys } from "../store/keys.js";

export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Requests counted in the current window, including this one */
  count: number;
  /** Seconds until the window resets */
  resetSeconds: number;
}

export interface RateLimiterOptions {
  maxRequests: number;
  windowSeconds: number;
}

/** Log a warning once a caller has used this share of the window's budget. */
const WARNING_RATIO = 0.8;

export class RateLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly options: RateLimiterOptions
  ) {}

  get maxRequests(): number {
    return this.options.maxRequests;
  }

  get windowSeconds(): number {
    return this.options.windowSeconds;
  }

  /**
   * Count this request against `identifier` and decide whether it is admitted.
   * Rejected requests are not refunded, so retry storms can't reset the budget.
   */
  async check(
    identifier: string,
    maxRequests: number = this.options.maxRequests,
    windowSeconds: number = this.options.windowSeconds
  ): Promise<RateLimitResult> {
    const key = keys.rateLimit(identifier);

    try {
      const count = await this.store.incrementWithExpiry(key, windowSeconds);
      const ttl = await this.store.ttl(key);
      const resetSeconds = ttl > 0 ? ttl : windowSeconds;
      const allowed = count <= maxRequests;

      if (!allowed) {
        log.rateLimit.warn({ identifier, count, limit: maxRequests, windowSeconds }, "Rate limit exceeded");
      } else if (count > maxRequests * WARNING_RATIO) {
        log.rateLimit.info({ identifier, count, limit: maxRequests }, "Approaching rate limit");
      }

      return {
        allowed,
        limit: maxRequests,
        remaining: Math.max(0, maxRequests - count),
        count,
        resetSeconds,
      };
    } catch (error) {
      // Fail open - allow request if rate limiter is down
      log.rateLimit.error({
        identifier,
        error: error instanceof Error ? error.message : String(error),
      }, "Rate limit check failed, allowing request");

      return {
        allowed: true,
        limit: maxRequests,
        remaining: maxRequests,
        count: 0,
        resetSeconds: windowSeconds,
      };
    }
  }

  /**
   * Requests left for `identifier` in the current window.
   */
  async getRemaining(identifier: string): Promise<number> {
    try {
      const value = await this.store.get(keys.rateLimit(identifier));
      const count = value === null ? 0 : Number(value);
      return Math.max(0, this.options.maxRequests - count);
    } catch (error) {
      log.rateLimit.error({
        identifier,
        error: error instanceof Error ? error.message : String(error),
      }, "Failed to read remaining requests");
      return this.options.maxRequests;
    }
  }

  /**
   * Clear the counter for `identifier`. Returns false if the store refused.
   */
  async reset(identifier: string): Promise<boolean> {
    try {
      await this.store.delete(keys.rateLimit(identifier));
      log.rateLimit.info({ identifier }, "Rate limit reset");
      return true;
    } catch (error) {
      log.rateLimit.error({
        identifier,
        error: error instanceof Error ? error.message : String(error),
      }, "Failed to reset rate limit");
      return false;
    }
  }
}
