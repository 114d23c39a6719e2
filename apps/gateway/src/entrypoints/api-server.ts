/**
 * API Server Entrypoint
 *
 * - /api/v1/* - notification intake, status, listing, token check
 * - /metrics - Prometheus metrics
 * - /health - liveness, reports degraded dependencies
 *
 * Listens before dependencies connect, so /health answers "starting" while
 * the broker and store come up.
 */

import { config, log, withTimeout, createShutdownHandler } from "./shared.js";
import { createGateway, startGateway } from "../gateway.js";
import { buildApp } from "../http/app.js";

const SERVICE = "api-server";

const gateway = createGateway(config);

const app = buildApp({
  orchestrator: gateway.orchestrator,
  health: gateway.health,
  service: config.SERVICE_NAME,
  version: config.SERVICE_VERSION,
  bodyLimit: config.MAX_REQUEST_SIZE_BYTES,
});

async function start(): Promise<void> {
  log.system.info({ service: SERVICE }, "starting");

  await app.listen({ port: config.PORT, host: "0.0.0.0" });
  log.system.info({ service: SERVICE, port: config.PORT, env: config.NODE_ENV }, "listening");

  const ready = await startGateway(gateway, (dependency, error) => {
    log.system.error({
      dependency,
      error: error instanceof Error ? error.message : String(error),
    }, "dependency unavailable, starting degraded");
  });

  log.system.info({ service: SERVICE, degraded: !ready }, "startup complete");
}

async function shutdown(): Promise<void> {
  await withTimeout(app.close(), 2000, "Fastify");
  await withTimeout(gateway.publisher.close(), 2000, "RabbitMQ");
  await withTimeout(gateway.store.close(), 2000, "Redis");
}

createShutdownHandler(SERVICE, shutdown);

start().catch((error: unknown) => {
  log.system.error({ error: error instanceof Error ? error.message : String(error) }, "api-server startup failed");
  process.exit(1);
});
