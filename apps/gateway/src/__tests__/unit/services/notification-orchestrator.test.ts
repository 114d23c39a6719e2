import { describe, it, expect, beforeEach } from "vitest";
import {
  AuthenticationError,
  CircuitOpenError,
  NotFoundError,
  PublishFailedError,
  RateLimitExceededError,
  StoreUnavailableError,
  ValidationError,
} from "../../../errors.js";
import { InMemoryKeyValueStore } from "../../../store/memory-store.js";
import { NotificationOrchestrator } from "../../../services/notification-orchestrator.js";
import { IdempotencyCache } from "../../../services/idempotency-cache.js";
import { JwtAuthValidator } from "../../../services/auth.js";
import { RateLimiter } from "../../../services/rate-limiter.js";
import { NotificationStatusStore } from "../../../services/status-store.js";
import { CircuitBreaker } from "../../../domain/circuit-breaker/index.js";
import {
  RecordingPublisher,
  TEST_SECRET,
  TEST_USER,
  createHarness,
  notificationRequest,
  signAccessToken,
  type GatewayHarness,
} from "../../helpers/gateway-harness.js";

const ACCEPTED_BODY = JSON.stringify({
  success: true,
  data: {
    notification_id: "notif-1",
    status: "pending",
    request_id: "req-1",
    notification_type: "email",
  },
  error: null,
  message: "Notification queued for processing",
  meta: null,
});

describe("NotificationOrchestrator", () => {
  let harness: GatewayHarness;
  let token: string;

  beforeEach(() => {
    harness = createHarness();
    token = signAccessToken();
  });

  describe("accept", () => {
    it("should publish the job, record pending status and return the envelope", async () => {
      const result = await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1");

      expect(result.body).toBe(ACCEPTED_BODY);
      expect(result.replayed).toBe(false);
      expect(result.rateLimit).toMatchObject({ allowed: true, count: 1, remaining: 99 });

      expect(harness.publisher.published).toEqual([
        {
          routingKey: "notification.email",
          job: {
            notification_id: "notif-1",
            correlation_id: "corr-1",
            user_id: TEST_USER,
            notification_type: "email",
            template_code: "welcome",
            variables: { name: "Ada", link: "https://example.com/welcome", meta: null },
            priority: 1,
            metadata: null,
            created_at: "2026-01-01T00:00:00.000Z",
            retry_count: 0,
          },
        },
      ]);

      expect(await harness.gateway.orchestrator.getStatus(token, "notif-1")).toEqual({
        notification_id: "notif-1",
        status: "pending",
        notification_type: "email",
        user_id: TEST_USER,
        template_code: "welcome",
        created_at: "2026-01-01T00:00:00.000Z",
      });
    });

    it("should route push notifications to the push key", async () => {
      await harness.gateway.orchestrator.accept(
        token,
        notificationRequest({ notification_type: "push", request_id: "req-push" }),
        "corr-1"
      );

      expect(harness.publisher.published[0]?.routingKey).toBe("notification.push");
    });

    it("should replay the cached response without publishing again", async () => {
      const first = await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1");
      const second = await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-2");

      expect(second.body).toBe(first.body);
      expect(second.replayed).toBe(true);
      expect(harness.publisher.attempts).toBe(1);
      expect(await harness.store.scanKeys("notification:status:*")).toEqual(["notification:status:notif-1"]);
    });

    it("should treat a request id as new once its cache entry expires", async () => {
      await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1");
      harness.advance(86_400 * 1000);

      const again = await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1");

      expect(again.replayed).toBe(false);
      expect(harness.publisher.attempts).toBe(2);
    });

    it("should write no status when the publish fails", async () => {
      harness.publisher.failWith = new Error("channel closed");

      await expect(
        harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1")
      ).rejects.toBeInstanceOf(PublishFailedError);

      expect(await harness.store.scanKeys("notification:status:*")).toEqual([]);
      expect(await harness.store.get("idempotent:req-1")).toBeNull();
    });

    it("should reject bad tokens before touching the store", async () => {
      await expect(
        harness.gateway.orchestrator.accept(signAccessToken(TEST_USER, "refresh"), notificationRequest(), "corr-1")
      ).rejects.toBeInstanceOf(AuthenticationError);

      expect(harness.store.size()).toBe(0);
      expect(harness.publisher.attempts).toBe(0);
    });

    it("should reject callers over their rate limit without publishing", async () => {
      harness = createHarness({ RATE_LIMIT_REQUESTS: "2" });

      await harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: "a" }), "c");
      await harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: "b" }), "c");

      const error = await harness.gateway.orchestrator
        .accept(token, notificationRequest({ request_id: "c" }), "c")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      expect(error).toMatchObject({ limit: 2, resetSeconds: 60 });
      expect(harness.publisher.attempts).toBe(2);
    });

    it("should skip admission control when rate limiting is disabled", async () => {
      harness = createHarness({ RATE_LIMIT_REQUESTS: "1", DISABLE_RATE_LIMIT: "true" });

      await harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: "a" }), "c");
      const second = await harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: "b" }), "c");

      expect(second.rateLimit).toBeNull();
      expect(await harness.store.get("rate_limit:" + TEST_USER)).toBeNull();
    });

    it("should open the circuit after five failed publishes and probe after the timeout", async () => {
      harness.publisher.failWith = new Error("broker down");

      for (let i = 1; i <= 5; i++) {
        await expect(
          harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: `fail-${i}` }), "c")
        ).rejects.toBeInstanceOf(PublishFailedError);
      }
      expect(harness.publisher.attempts).toBe(5);

      await expect(
        harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: "fail-6" }), "c")
      ).rejects.toBeInstanceOf(CircuitOpenError);
      expect(harness.publisher.attempts).toBe(5);

      harness.advance(60_000);
      harness.publisher.failWith = null;

      const recovered = await harness.gateway.orchestrator.accept(
        token,
        notificationRequest({ request_id: "probe" }),
        "c"
      );

      expect(recovered.replayed).toBe(false);
      expect(harness.publisher.attempts).toBe(6);
      expect(harness.gateway.breaker.state).toBe("closed");
    });

    it("should still succeed when caching the response fails", async () => {
      class CacheWriteFails extends InMemoryKeyValueStore {
        override async set(key: string, value: string, ttlSeconds: number): Promise<void> {
          if (key.startsWith("idempotent:")) throw new Error("OOM command not allowed");
          return super.set(key, value, ttlSeconds);
        }
      }
      const orchestrator = buildOrchestrator(new CacheWriteFails(), new RecordingPublisher());

      const result = await orchestrator.accept(token, notificationRequest(), "corr-1");
      expect(JSON.parse(result.body)).toMatchObject({ success: true, data: { request_id: "req-1" } });
    });

    it("should fail closed when the idempotency lookup fails", async () => {
      class LookupFails extends InMemoryKeyValueStore {
        override async get(): Promise<string | null> {
          throw new Error("connection refused");
        }
      }
      const publisher = new RecordingPublisher();
      const orchestrator = buildOrchestrator(new LookupFails(), publisher);

      await expect(orchestrator.accept(token, notificationRequest(), "corr-1")).rejects.toBeInstanceOf(
        StoreUnavailableError
      );
      expect(publisher.attempts).toBe(0);
    });

    it("should assign a fresh UUID by default", async () => {
      const publisher = new RecordingPublisher();
      const orchestrator = buildOrchestrator(new InMemoryKeyValueStore(), publisher);

      const result = await orchestrator.accept(token, notificationRequest(), "corr-1");

      expect(JSON.parse(result.body).data.notification_id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      );
    });
  });

  describe("getStatus", () => {
    it("should throw NotFoundError for unknown ids", async () => {
      await expect(harness.gateway.orchestrator.getStatus(token, "missing")).rejects.toThrow(
        new NotFoundError("Notification missing not found")
      );
    });
  });

  describe("updateStatus", () => {
    it("should merge a delivery update", async () => {
      await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1");

      const ack = await harness.gateway.orchestrator.updateStatus("email", {
        notification_id: "notif-1",
        status: "delivered",
        timestamp: "2026-01-01T00:01:00.000Z",
      });

      expect(ack).toEqual({ notification_id: "notif-1", status: "delivered", updated: true });
      expect(await harness.gateway.orchestrator.getStatus(token, "notif-1")).toMatchObject({
        status: "delivered",
        updated_at: "2026-01-01T00:01:00.000Z",
        error_message: null,
      });
    });

    it("should stamp updated_at with the current time when no timestamp is given", async () => {
      await harness.gateway.orchestrator.accept(token, notificationRequest(), "corr-1");
      harness.advance(5_000);

      await harness.gateway.orchestrator.updateStatus("email", {
        notification_id: "notif-1",
        status: "failed",
        error: "mailbox full",
      });

      expect(await harness.gateway.orchestrator.getStatus(token, "notif-1")).toMatchObject({
        status: "failed",
        updated_at: "2026-01-01T00:00:05.000Z",
        error_message: "mailbox full",
      });
    });

    it("should reject unknown preferences", async () => {
      await expect(
        harness.gateway.orchestrator.updateStatus("sms", { notification_id: "notif-1", status: "delivered" })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it("should not create records for unknown ids", async () => {
      await expect(
        harness.gateway.orchestrator.updateStatus("push", { notification_id: "ghost", status: "delivered" })
      ).rejects.toBeInstanceOf(NotFoundError);

      expect(harness.store.size()).toBe(0);
    });
  });

  describe("list", () => {
    it("should page through the caller's notifications", async () => {
      for (let i = 1; i <= 3; i++) {
        await harness.gateway.orchestrator.accept(token, notificationRequest({ request_id: `req-${i}` }), "c");
        harness.advance(1_000);
      }

      const page = await harness.gateway.orchestrator.list(token, 1, 2);

      expect(page.items.map((item) => item.notification_id)).toEqual(["notif-3", "notif-2"]);
      expect(page.meta).toEqual({
        total: 3,
        limit: 2,
        page: 1,
        total_pages: 2,
        has_next: true,
        has_previous: false,
      });
    });
  });
});

function buildOrchestrator(store: InMemoryKeyValueStore, publisher: RecordingPublisher): NotificationOrchestrator {
  return new NotificationOrchestrator({
    auth: new JwtAuthValidator({ secret: TEST_SECRET, algorithm: "HS256" }),
    rateLimiter: new RateLimiter(store, { maxRequests: 100, windowSeconds: 60 }),
    idempotency: new IdempotencyCache(store, 86_400),
    statusStore: new NotificationStatusStore(store, 604_800),
    publisher,
    breaker: new CircuitBreaker({ name: "test", failMax: 5, timeoutMs: 60_000 }),
  });
}
