import { randomUUID } from "node:crypto";
import { fastify, type FastifyInstance } from "fastify";
import { errorEnvelope } from "../domain/utils/envelope.js";
import { isGatewayError, RateLimitExceededError, CircuitOpenError, ValidationError } from "../errors.js";
import type { HealthReporter } from "../health.js";
import { log, withTrace } from "../logger.js";
import { register } from "../metrics.js";
import type { NotificationOrchestrator } from "../services/notification-orchestrator.js";
import { registerNotificationRoutes } from "./routes.js";

export const CORRELATION_HEADER = "x-correlation-id";

export interface AppDeps {
  orchestrator: NotificationOrchestrator;
  health: HealthReporter;
  service: string;
  version: string;
  bodyLimit?: number;
}

/**
 * Build the HTTP surface. Does not listen.
 *
 * The inbound X-Correlation-ID (or a fresh UUID) becomes the request id,
 * the trace id of every log line for the request, and the queued job's
 * correlation id; it is echoed back on the response.
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const app = fastify({
    logger: false,
    bodyLimit: deps.bodyLimit,
    ignoreTrailingSlash: true,
    genReqId: (req) => {
      const header = req.headers[CORRELATION_HEADER];
      const value = Array.isArray(header) ? header[0] : header;
      return value || randomUUID();
    },
  });

  app.addHook("onRequest", (request, reply, done) => {
    reply.header("X-Correlation-ID", request.id);
    withTrace(() => {
      log.api.debug({ method: request.method, url: request.url }, "incoming request");
      done();
    }, request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (isGatewayError(error)) {
      if (error instanceof RateLimitExceededError) {
        reply.header("X-RateLimit-Limit", error.limit);
        reply.header("X-RateLimit-Remaining", 0);
        reply.header("X-RateLimit-Reset", error.resetSeconds);
        reply.header("Retry-After", error.resetSeconds);
      } else if (error instanceof CircuitOpenError) {
        reply.header("Retry-After", error.retryAfterSeconds);
      }

      log.api.warn({
        url: request.url,
        method: request.method,
        statusCode: error.statusCode,
        code: error.code,
        error: error.message,
      }, "request failed");

      const data = error instanceof ValidationError ? { issues: error.issues } : null;
      return reply.status(error.statusCode).send(errorEnvelope(error.message, error.message, data));
    }

    // Framework errors on the client's side (malformed JSON, oversized body)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorEnvelope(error.message));
    }

    log.api.error({
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    }, "unhandled error");

    return reply.status(500).send(errorEnvelope("Internal server error", "An unexpected error occurred"));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(errorEnvelope("Not found", `Route ${request.method} ${request.url} not found`));
  });

  app.get("/", async () => ({
    service: deps.service,
    version: deps.version,
    status: "running",
    health_check: "/health",
  }));

  app.get("/health", async () => deps.health.report());

  app.get("/metrics", async (_request, reply) => {
    return reply.type(register.contentType).send(await register.metrics());
  });

  registerNotificationRoutes(app, deps.orchestrator);

  return app;
}
