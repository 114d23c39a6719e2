import { log } from "./logger.js";
import type { CircuitState } from "./domain/circuit-breaker/types.js";

export interface HealthChecks {
  rabbitmq: boolean;
  redis: boolean;
  service: "up";
}

export type HealthReport =
  | {
      status: "starting";
      service: string;
      version: string;
      timestamp: string;
      message: string;
    }
  | {
      status: "healthy" | "degraded";
      service: string;
      version: string;
      timestamp: string;
      checks: HealthChecks;
    };

export interface HealthReporterDeps {
  service: string;
  version: string;
  publisher: { isConnected(): boolean };
  breaker: { readonly state: CircuitState };
  store: { ping(): Promise<boolean> };
  now?: () => Date;
}

/**
 * Liveness report for /health. Never fails: a broken dependency shows up as
 * `degraded`, and until startup finishes the report is `starting`.
 */
export class HealthReporter {
  private startupComplete = false;
  private readonly now: () => Date;

  constructor(private readonly deps: HealthReporterDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Startup is over, whether or not dependencies connected. */
  markStarted(): void {
    this.startupComplete = true;
  }

  get started(): boolean {
    return this.startupComplete;
  }

  async report(): Promise<HealthReport> {
    const { service, version } = this.deps;
    const timestamp = this.now().toISOString();

    if (!this.startupComplete) {
      return { status: "starting", service, version, timestamp, message: "Service initializing..." };
    }

    const checks: HealthChecks = {
      rabbitmq: this.deps.publisher.isConnected() && this.deps.breaker.state !== "open",
      redis: await this.deps.store.ping(),
      service: "up",
    };

    const status = checks.rabbitmq && checks.redis ? "healthy" : "degraded";
    if (status === "degraded") {
      log.system.warn({ checks }, "health degraded");
    }

    return { status, service, version, timestamp, checks };
  }
}
