import { createConnection } from "node:net";
import { log } from "../logger.js";
import { calculateBackoff } from "../domain/utils/backoff.js";
import { TimeoutDelayProvider, type DelayProvider } from "../domain/utils/delay.js";

/** Resolves once a TCP connection to host:port opens, rejects otherwise. */
export type TcpProbe = (host: string, port: number, timeoutMs: number) => Promise<void>;

export interface ReadinessProbeOptions {
  host: string;
  port: number;
  /** Total probe attempts before giving up (default: 10) */
  attempts?: number;
  /** First retry delay; doubles each attempt (default: 1000) */
  baseDelayMs?: number;
  /** Per-attempt connect timeout (default: 3000) */
  timeoutMs?: number;
  probe?: TcpProbe;
  delayProvider?: DelayProvider;
}

export class BrokerUnreachableError extends Error {
  constructor(host: string, port: number, attempts: number, options?: { cause?: unknown }) {
    super(`Broker port ${host}:${port} not reachable after ${attempts} attempts`, options);
    this.name = "BrokerUnreachableError";
  }
}

/**
 * Open and immediately close a plain TCP socket.
 */
export const tcpProbe: TcpProbe = (host, port, timeoutMs) =>
  new Promise<void>((resolve, reject) => {
    const socket = createConnection({ host, port });
    socket.setTimeout(timeoutMs);

    socket.once("connect", () => {
      socket.end();
      resolve();
    });
    socket.once("timeout", () => {
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    });
    socket.once("error", (error) => {
      socket.destroy();
      reject(error);
    });
  });

/**
 * Wait until the broker's port accepts TCP connections.
 *
 * The port can open before the broker is ready to negotiate AMQP, and an
 * early protocol handshake fails with misleading errors, so the publisher
 * runs this before every connect. Failed attempt n waits base × 2^(n-1).
 *
 * @throws BrokerUnreachableError once every attempt has failed
 */
export async function waitForBroker(options: ReadinessProbeOptions): Promise<void> {
  const {
    host,
    port,
    attempts = 10,
    baseDelayMs = 1000,
    timeoutMs = 3000,
    probe = tcpProbe,
    delayProvider = new TimeoutDelayProvider(),
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await probe(host, port, timeoutMs);
      log.broker.info({ host, port, attempt }, "broker port is open");
      return;
    } catch (error) {
      lastError = error;
      if (attempt === attempts) break;

      const wait = calculateBackoff(attempt - 1, baseDelayMs);
      log.broker.debug({
        host,
        port,
        attempt,
        attempts,
        retryInMs: wait,
        error: error instanceof Error ? error.message : String(error),
      }, "broker not ready");
      await delayProvider.delay(wait);
    }
  }

  throw new BrokerUnreachableError(host, port, attempts, { cause: lastError });
}
