/**
 * Process plumbing shared by service entrypoints.
 */

import { config } from "../config.js";
import { log } from "../logger.js";
import { withDeadline } from "../domain/utils/deadline.js";

export { config, log };

const SHUTDOWN_TIMEOUT_MS = 30000;

/**
 * Await `promise`, giving up after `timeoutMs`. A timeout or rejection is
 * logged, not thrown, so one stuck dependency can't block the rest of
 * shutdown.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  name: string
): Promise<T | void> {
  try {
    return await withDeadline(promise, timeoutMs, name);
  } catch (error) {
    log.system.warn({ error: error instanceof Error ? error.message : String(error), component: name }, "shutdown step failed");
  }
}

export function createShutdownHandler(
  serviceName: string,
  shutdownFn: () => Promise<void>
): void {
  let shutdownInProgress = false;

  async function initiateShutdown(): Promise<void> {
    if (shutdownInProgress) {
      log.system.warn({ service: serviceName }, "shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;

    log.system.info({ service: serviceName }, "shutting down");

    const forceExitTimer = setTimeout(() => {
      log.system.error({ service: serviceName }, "shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await shutdownFn();
      log.system.info({ service: serviceName }, "shutdown complete");
      process.exit(0);
    } catch (error) {
      log.system.error({ service: serviceName, error: error instanceof Error ? error.message : String(error) }, "shutdown error");
      process.exit(1);
    }
  }

  const onSignal = (): void => {
    void initiateShutdown();
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}
