export * from "./types.js";
export * from "./functions.js";
export { CircuitBreaker, type CircuitBreakerOptions } from "./circuit-breaker.js";
