import { buildAmqpUrl, type Config } from "@notifygate/config";
import { MessagePublisher } from "./broker/publisher.js";
import { CircuitBreaker } from "./domain/circuit-breaker/index.js";
import { HealthReporter } from "./health.js";
import { recordCircuitState } from "./metrics.js";
import { JwtAuthValidator, type AuthValidator } from "./services/auth.js";
import { IdempotencyCache } from "./services/idempotency-cache.js";
import { NotificationOrchestrator, type JobPublisher } from "./services/notification-orchestrator.js";
import { RateLimiter } from "./services/rate-limiter.js";
import { NotificationStatusStore } from "./services/status-store.js";
import type { KeyValueStore } from "./store/key-value-store.js";
import { RedisKeyValueStore } from "./store/redis-store.js";

export const PUBLISH_BREAKER = "rabbitmq-publish";

/** The broker-facing side the gateway needs at runtime. */
export interface GatewayPublisher extends JobPublisher {
  connect(): Promise<void>;
  isConnected(): boolean;
  close(): Promise<void>;
}

export interface GatewayStore extends KeyValueStore {
  connect?(): Promise<void>;
}

export interface Gateway {
  store: GatewayStore;
  publisher: GatewayPublisher;
  breaker: CircuitBreaker;
  orchestrator: NotificationOrchestrator;
  health: HealthReporter;
}

export interface GatewayOverrides {
  store?: GatewayStore;
  publisher?: GatewayPublisher;
  auth?: AuthValidator;
  now?: () => number;
  generateId?: () => string;
}

/**
 * Composition root: one instance of each component per process.
 * Nothing connects here; see `startGateway`.
 */
export function createGateway(config: Config, overrides: GatewayOverrides = {}): Gateway {
  const store = overrides.store ?? new RedisKeyValueStore({
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    db: config.REDIS_DB,
    username: config.REDIS_USERNAME,
    password: config.REDIS_PASSWORD,
  });

  const publisher = overrides.publisher ?? new MessagePublisher({
    url: buildAmqpUrl(config),
    host: config.RABBITMQ_HOST,
    port: config.RABBITMQ_PORT,
    exchange: config.RABBITMQ_EXCHANGE,
    connectRetries: config.RABBITMQ_CONNECT_RETRIES,
    probeBaseDelayMs: config.RABBITMQ_PROBE_BASE_DELAY_MS,
    probeTimeoutMs: config.RABBITMQ_PROBE_TIMEOUT_MS,
    connectTimeoutMs: config.RABBITMQ_CONNECT_TIMEOUT_MS,
  });

  const breaker = new CircuitBreaker({
    name: PUBLISH_BREAKER,
    failMax: config.CIRCUIT_BREAKER_FAIL_MAX,
    timeoutMs: config.CIRCUIT_BREAKER_TIMEOUT * 1000,
    now: overrides.now,
    onStateChange: (_from, to) => recordCircuitState(PUBLISH_BREAKER, to),
  });
  recordCircuitState(PUBLISH_BREAKER, breaker.state);

  const now = overrides.now;
  const orchestrator = new NotificationOrchestrator({
    auth: overrides.auth ?? new JwtAuthValidator({ secret: config.JWT_SECRET, algorithm: config.JWT_ALGORITHM }),
    rateLimiter: new RateLimiter(store, {
      maxRequests: config.RATE_LIMIT_REQUESTS,
      windowSeconds: config.RATE_LIMIT_WINDOW,
    }),
    idempotency: new IdempotencyCache(store, config.IDEMPOTENCY_TTL),
    statusStore: new NotificationStatusStore(store, config.NOTIFICATION_STATUS_TTL),
    publisher,
    breaker,
    rateLimitDisabled: config.DISABLE_RATE_LIMIT,
    generateId: overrides.generateId,
    now: now ? () => new Date(now()) : undefined,
  });

  const health = new HealthReporter({
    service: config.SERVICE_NAME,
    version: config.SERVICE_VERSION,
    publisher,
    breaker,
    store,
    now: now ? () => new Date(now()) : undefined,
  });

  return { store, publisher, breaker, orchestrator, health };
}

/**
 * Connect the store, then the broker. A failure leaves the gateway running
 * degraded; /health reports which dependency is down. Startup is marked
 * complete either way.
 *
 * @returns whether both connections came up
 */
export async function startGateway(gateway: Gateway, onError: (dependency: string, error: unknown) => void): Promise<boolean> {
  let ok = true;

  try {
    await gateway.store.connect?.();
  } catch (error) {
    ok = false;
    onError("redis", error);
  }

  try {
    await gateway.publisher.connect();
  } catch (error) {
    ok = false;
    onError("rabbitmq", error);
  }

  gateway.health.markStarted();
  return ok;
}
