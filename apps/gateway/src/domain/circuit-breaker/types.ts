/**
 * Circuit breaker types.
 */

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerState {
  /** Current state of the circuit */
  state: CircuitState;
  /** Consecutive failures; reset on every transition into closed */
  failureCount: number;
  /** Timestamp (ms) of the last recorded failure, null until the first one */
  lastFailureTime: number | null;
}

export interface CircuitBreakerConfig {
  /** Failures in closed state that trip the circuit */
  failMax: number;
  /** Time in ms before an open circuit lets a probe through */
  timeoutMs: number;
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  /** ISO-8601, null if the breaker has never failed */
  lastFailure: string | null;
  isAvailable: boolean;
}
