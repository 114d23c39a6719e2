import { Counter, Gauge, collectDefaultMetrics, register as promRegister } from "prom-client";
import type { CircuitState } from "./domain/circuit-breaker/types.js";

// Process metrics (CPU, memory, event loop lag)
collectDefaultMetrics({ prefix: "gateway_" });

export const register = promRegister;

// ============================================
// Intake Metrics
// ============================================

/**
 * Counter: Notifications accepted and queued
 * Labels: type (email/push)
 */
export const notificationsAcceptedTotal = new Counter({
  name: "notifications_accepted_total",
  help: "Total number of notifications accepted and queued",
  labelNames: ["type"] as const,
});

/**
 * Counter: Requests answered from the idempotency cache
 */
export const idempotentReplaysTotal = new Counter({
  name: "idempotent_replays_total",
  help: "Total number of requests answered with a cached response",
});

/**
 * Counter: Requests rejected by the rate limiter
 */
export const rateLimitRejectionsTotal = new Counter({
  name: "rate_limit_rejections_total",
  help: "Total number of requests rejected by the rate limiter",
});

// ============================================
// Broker Metrics
// ============================================

/**
 * Counter: Publishes that did not reach the broker
 * Labels: reason (circuit_open/publish_error)
 */
export const publishFailuresTotal = new Counter({
  name: "publish_failures_total",
  help: "Total number of notification publishes that failed",
  labelNames: ["reason"] as const,
});

/**
 * Gauge: Circuit breaker state (0=closed, 1=half_open, 2=open)
 * Labels: breaker
 */
export const circuitBreakerState = new Gauge({
  name: "circuit_breaker_state",
  help: "Circuit breaker state (0=closed, 1=half_open, 2=open)",
  labelNames: ["breaker"] as const,
});

const CIRCUIT_STATE_VALUES: Record<CircuitState, number> = {
  closed: 0,
  half_open: 1,
  open: 2,
};

export function recordCircuitState(breaker: string, state: CircuitState): void {
  circuitBreakerState.set({ breaker }, CIRCUIT_STATE_VALUES[state]);
}
