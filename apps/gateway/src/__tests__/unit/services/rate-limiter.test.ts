import { describe, it, expect, beforeEach } from "vitest";
import { RateLimiter } from "../../../services/rate-limiter.js";
import { InMemoryKeyValueStore } from "../../../store/memory-store.js";
import type { KeyValueStore } from "../../../store/key-value-store.js";

class UnreachableStore extends InMemoryKeyValueStore {
  override async incrementWithExpiry(): Promise<number> {
    throw new Error("connection refused");
  }

  override async get(): Promise<string | null> {
    throw new Error("connection refused");
  }

  override async delete(): Promise<boolean> {
    throw new Error("connection refused");
  }
}

describe("RateLimiter", () => {
  let clock: number;
  let store: KeyValueStore;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = 0;
    store = new InMemoryKeyValueStore(() => clock);
    limiter = new RateLimiter(store, { maxRequests: 100, windowSeconds: 60 });
  });

  it("should admit 100 requests and reject the 101st in one window", async () => {
    for (let i = 1; i <= 100; i++) {
      const result = await limiter.check("U1");
      expect(result.allowed).toBe(true);
    }

    const rejected = await limiter.check("U1");
    expect(rejected).toEqual({
      allowed: false,
      limit: 100,
      remaining: 0,
      count: 101,
      resetSeconds: 60,
    });
  });

  it("should keep counting rejected requests", async () => {
    const tight = new RateLimiter(store, { maxRequests: 2, windowSeconds: 60 });
    await tight.check("U1");
    await tight.check("U1");
    await tight.check("U1");

    expect((await tight.check("U1")).count).toBe(4);
    expect(await store.get("rate_limit:U1")).toBe("4");
  });

  it("should start a fresh budget after the window elapses", async () => {
    for (let i = 0; i < 101; i++) {
      await limiter.check("U1");
    }

    clock = 60_000;
    const result = await limiter.check("U1");
    expect(result).toMatchObject({ allowed: true, count: 1, remaining: 99 });
  });

  it("should not extend the window on later requests", async () => {
    await limiter.check("U1");
    clock = 45_000;
    const result = await limiter.check("U1");

    expect(result.resetSeconds).toBe(15);
  });

  it("should keep identifiers independent", async () => {
    const tight = new RateLimiter(store, { maxRequests: 1, windowSeconds: 60 });
    await tight.check("U1");

    expect((await tight.check("U1")).allowed).toBe(false);
    expect((await tight.check("U2")).allowed).toBe(true);
  });

  it("should accept per-call limits", async () => {
    const result = await limiter.check("U1", 5, 10);
    expect(result).toEqual({ allowed: true, limit: 5, remaining: 4, count: 1, resetSeconds: 10 });
  });

  it("should fail open when the store is unreachable", async () => {
    const failOpen = new RateLimiter(new UnreachableStore(), { maxRequests: 100, windowSeconds: 60 });

    expect(await failOpen.check("U1")).toEqual({
      allowed: true,
      limit: 100,
      remaining: 100,
      count: 0,
      resetSeconds: 60,
    });
  });

  describe("getRemaining", () => {
    it("should report the budget left in the window", async () => {
      await limiter.check("U1");
      await limiter.check("U1");
      expect(await limiter.getRemaining("U1")).toBe(98);
      expect(await limiter.getRemaining("U2")).toBe(100);
    });

    it("should fall back to the full budget when the store is down", async () => {
      const failOpen = new RateLimiter(new UnreachableStore(), { maxRequests: 100, windowSeconds: 60 });
      expect(await failOpen.getRemaining("U1")).toBe(100);
    });
  });

  describe("reset", () => {
    it("should clear the counter", async () => {
      await limiter.check("U1");
      expect(await limiter.reset("U1")).toBe(true);
      expect(await limiter.getRemaining("U1")).toBe(100);
    });

    it("should return false when the store refuses", async () => {
      const failOpen = new RateLimiter(new UnreachableStore(), { maxRequests: 100, windowSeconds: 60 });
      expect(await failOpen.reset("U1")).toBe(false);
    });
  });
});
