import { describe, it, expect, beforeEach } from "vitest";
import { IdempotencyCache } from "../../../services/idempotency-cache.js";
import { InMemoryKeyValueStore } from "../../../store/memory-store.js";
import { StoreUnavailableError } from "../../../errors.js";

class BrokenStore extends InMemoryKeyValueStore {
  override async get(): Promise<string | null> {
    throw new Error("connection refused");
  }

  override async set(): Promise<void> {
    throw new Error("connection refused");
  }
}

describe("IdempotencyCache", () => {
  let clock: number;
  let store: InMemoryKeyValueStore;
  let cache: IdempotencyCache;

  beforeEach(() => {
    clock = 0;
    store = new InMemoryKeyValueStore(() => clock);
    cache = new IdempotencyCache(store, 86_400);
  });

  it("should miss for an unseen request id", async () => {
    expect(await cache.lookup("req-1")).toBeNull();
  });

  it("should return the exact stored bytes", async () => {
    const body = '{"success":true,"data":{"notification_id":"n-1"}}';
    expect(await cache.store("req-1", body)).toBe(true);

    expect(await cache.lookup("req-1")).toBe(body);
    expect(await store.get("idempotent:req-1")).toBe(body);
  });

  it("should forget entries after the default TTL", async () => {
    await cache.store("req-1", "{}");
    clock = 86_400 * 1000;
    expect(await cache.lookup("req-1")).toBeNull();
  });

  it("should honour an explicit TTL", async () => {
    await cache.store("req-1", "{}", 5);
    clock = 5_000;
    expect(await cache.lookup("req-1")).toBeNull();
  });

  it("should surface lookup failures", async () => {
    const broken = new IdempotencyCache(new BrokenStore(), 60);
    await expect(broken.lookup("req-1")).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it("should swallow store failures and report them", async () => {
    const broken = new IdempotencyCache(new BrokenStore(), 60);
    await expect(broken.store("req-1", "{}")).resolves.toBe(false);
  });
});
