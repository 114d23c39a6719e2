/**
 * Circuit breaker pure functions.
 * All state transitions are pure - no side effects.
 */

import type {
  CircuitBreakerState,
  CircuitBreakerConfig,
  CircuitBreakerStatus,
} from "./types.js";

/**
 * Create initial circuit breaker state. A fresh process assumes the
 * dependency is healthy.
 */
export function createInitialState(): CircuitBreakerState {
  return {
    state: "closed",
    failureCount: 0,
    lastFailureTime: null,
  };
}

/**
 * Whether an open circuit has waited long enough to let a probe through.
 */
export function shouldAttemptReset(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): boolean {
  if (state.lastFailureTime === null) {
    return true;
  }
  return now - state.lastFailureTime >= config.timeoutMs;
}

/**
 * Check if circuit should allow operation.
 *
 * @returns canProceed flag and the half-open state when an open circuit times out
 */
export function checkCircuit(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): { canProceed: boolean; newState?: CircuitBreakerState } {
  if (state.state === "closed" || state.state === "half_open") {
    return { canProceed: true };
  }

  // State is open - check if we should transition to half-open
  if (shouldAttemptReset(state, config, now)) {
    return {
      canProceed: true,
      newState: {
        ...state,
        state: "half_open",
      },
    };
  }

  return { canProceed: false };
}

/**
 * Record a successful operation. Any success closes the circuit and clears
 * the failure count, so only consecutive failures trip it.
 */
export function recordSuccess(state: CircuitBreakerState): CircuitBreakerState {
  if (state.state === "closed" && state.failureCount === 0) {
    return state;
  }

  return {
    ...state,
    state: "closed",
    failureCount: 0,
  };
}

/**
 * Record a failed operation.
 */
export function recordFailure(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): CircuitBreakerState {
  const failureCount = state.failureCount + 1;

  if (state.state === "half_open") {
    // Half-open is a single probe: one failure reopens
    return {
      state: "open",
      failureCount,
      lastFailureTime: now,
    };
  }

  if (failureCount >= config.failMax) {
    return {
      state: "open",
      failureCount,
      lastFailureTime: now,
    };
  }

  return {
    ...state,
    failureCount,
    lastFailureTime: now,
  };
}

/**
 * Seconds until an open circuit will admit a probe (0 when not open).
 */
export function secondsUntilRetry(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): number {
  if (state.state !== "open" || state.lastFailureTime === null) {
    return 0;
  }
  const remainingMs = config.timeoutMs - (now - state.lastFailureTime);
  return Math.max(0, Math.ceil(remainingMs / 1000));
}

/**
 * Get circuit breaker status for monitoring.
 */
export function getCircuitStatus(
  state: CircuitBreakerState,
  config: CircuitBreakerConfig,
  now: number
): CircuitBreakerStatus {
  const isAvailable =
    state.state === "closed" ||
    state.state === "half_open" ||
    shouldAttemptReset(state, config, now);

  return {
    state: state.state,
    failureCount: state.failureCount,
    lastFailure: state.lastFailureTime === null ? null : new Date(state.lastFailureTime).toISOString(),
    isAvailable,
  };
}
