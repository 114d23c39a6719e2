import { pino, type LoggerOptions } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage propagates the request's correlation id through every
// await without passing it around by hand.
//
// Usage:
//   withTrace(() => {
//     log.notification.info({ notificationId }, "queued"); // traceId added automatically
//   }, request.id);
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a trace ID. UUIDs so the value can double as a job correlation id.
 */
export function generateTraceId(): string {
  return randomUUID();
}

/**
 * Run `fn` with a trace context. All logs within, including those of async
 * work it starts, carry the traceId. Callback-style hooks continue the
 * request lifecycle from inside `fn`, so the whole request inherits it.
 * If no traceId is provided, a new one is generated.
 */
export function withTrace<T>(fn: () => T, traceId?: string): T {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.notification.info({ notificationId, type: "email" }, "queued")
//
// FAILURE (detailed, error level):
//   log.broker.error({ routingKey, error: err.message }, "publish failed")
//
// =============================================================================

const baseConfig: LoggerOptions = {
  level: config.LOG_LEVEL,

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  base: { service: config.SERVICE_NAME },

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,service",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // HTTP requests and responses
  api: logger.child({ component: "api" }),

  // Token validation
  auth: logger.child({ component: "auth" }),

  // Per-caller admission control
  rateLimit: logger.child({ component: "rate-limiter" }),

  // Request-id response cache
  idempotency: logger.child({ component: "idempotency" }),

  // Circuit breaker transitions
  circuit: logger.child({ component: "circuit" }),

  // RabbitMQ connection and publishes
  broker: logger.child({ component: "broker" }),

  // Redis operations
  store: logger.child({ component: "store" }),

  // Notification lifecycle
  notification: logger.child({ component: "notification" }),

  // Startup, shutdown, health
  system: logger.child({ component: "system" }),
};
