import { CircuitOpenError } from "../../errors.js";
import { log } from "../../logger.js";
import {
  createInitialState,
  checkCircuit,
  recordSuccess,
  recordFailure,
  getCircuitStatus,
  secondsUntilRetry,
} from "./functions.js";
import type {
  CircuitState,
  CircuitBreakerState,
  CircuitBreakerConfig,
  CircuitBreakerStatus,
} from "./types.js";

export interface CircuitBreakerOptions extends CircuitBreakerConfig {
  /** Name used in logs */
  name: string;
  /** Clock in ms, injectable for tests */
  now?: () => number;
  /** Called on every state transition */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

/**
 * In-process circuit breaker around one unreliable operation.
 *
 * State lives on the instance and is shared by every concurrent caller.
 * Each read-modify-write below runs synchronously between awaits, so on the
 * single event loop every transition is a critical section of its own.
 */
export class CircuitBreaker {
  private current: CircuitBreakerState = createInitialState();
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.config = { failMax: options.failMax, timeoutMs: options.timeoutMs };
    this.now = options.now ?? Date.now;
  }

  get name(): string {
    return this.options.name;
  }

  get state(): CircuitState {
    return this.current.state;
  }

  get failureCount(): number {
    return this.current.failureCount;
  }

  /**
   * Execute `operation` if the circuit permits it.
   *
   * Returns the operation's result, or rethrows its error after recording the
   * failure. Throws CircuitOpenError without invoking the operation while open.
   */
  async call<A extends unknown[], T>(
    operation: (...args: A) => Promise<T>,
    ...args: A
  ): Promise<T> {
    const isProbe = this.admit();

    try {
      const result = await operation(...args);
      this.onSuccess(isProbe);
      return result;
    } catch (error) {
      this.onFailure(isProbe, error);
      throw error;
    }
  }

  /** False while the circuit is open and not yet due for a probe. */
  isHealthy(): boolean {
    return getCircuitStatus(this.current, this.config, this.now()).isAvailable;
  }

  getState(): CircuitBreakerStatus {
    return getCircuitStatus(this.current, this.config, this.now());
  }

  /** Manually close the circuit. */
  reset(): void {
    this.transition(createInitialState());
    log.circuit.info({ breaker: this.name }, "manually reset");
  }

  /**
   * Decide whether this call may run. Returns true when the call is the
   * half-open probe.
   */
  private admit(): boolean {
    const now = this.now();

    // Half-open admits exactly one call: the one that moved it there
    if (this.current.state === "half_open") {
      throw new CircuitOpenError(Math.ceil(this.config.timeoutMs / 1000));
    }

    const { canProceed, newState } = checkCircuit(this.current, this.config, now);

    if (!canProceed) {
      log.circuit.warn({ breaker: this.name }, "circuit open, rejecting call");
      throw new CircuitOpenError(secondsUntilRetry(this.current, this.config, now));
    }

    if (newState) {
      this.transition(newState);
      log.circuit.info({ breaker: this.name }, "entering half-open, probing");
      return true;
    }

    return false;
  }

  private onSuccess(isProbe: boolean): void {
    // Outcomes of calls admitted before the circuit opened don't decide recovery
    if (!isProbe && this.current.state !== "closed") {
      return;
    }

    const wasProbe = this.current.state === "half_open";
    this.transition(recordSuccess(this.current));

    if (wasProbe) {
      log.circuit.info({ breaker: this.name }, "probe succeeded, circuit closed");
    }
  }

  private onFailure(isProbe: boolean, error: unknown): void {
    if (!isProbe && this.current.state !== "closed") {
      return;
    }

    const next = recordFailure(this.current, this.config, this.now());
    const opened = next.state === "open";
    this.transition(next);

    log.circuit.warn({
      breaker: this.name,
      failures: next.failureCount,
      failMax: this.config.failMax,
      error: error instanceof Error ? error.message : String(error),
    }, "call failed");

    if (opened) {
      log.circuit.error({
        breaker: this.name,
        failures: next.failureCount,
        retryAfterMs: this.config.timeoutMs,
      }, "circuit opened");
    }
  }

  private transition(next: CircuitBreakerState): void {
    const from = this.current.state;
    this.current = next;
    if (from !== next.state) {
      this.options.onStateChange?.(from, next.state);
    }
  }
}
