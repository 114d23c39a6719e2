import type { FastifyInstance, FastifyReply } from "fastify";
import { successEnvelope } from "../domain/utils/envelope.js";
import { extractBearerToken } from "../services/auth.js";
import type { NotificationOrchestrator } from "../services/notification-orchestrator.js";
import type { RateLimitResult } from "../services/rate-limiter.js";
import { listQuerySchema, notificationRequestSchema, parseOrThrow, statusUpdateSchema } from "./schemas.js";

export const API_PREFIX = "/api/v1";

export function setRateLimitHeaders(reply: FastifyReply, result: RateLimitResult): void {
  reply.header("X-RateLimit-Limit", result.limit);
  reply.header("X-RateLimit-Remaining", result.remaining);
  reply.header("X-RateLimit-Reset", result.resetSeconds);
}

export function registerNotificationRoutes(app: FastifyInstance, orchestrator: NotificationOrchestrator): void {
  // Accept a notification and queue it
  app.post(`${API_PREFIX}/notifications`, async (request, reply) => {
    const token = extractBearerToken(request.headers.authorization);
    const body = parseOrThrow(notificationRequestSchema, request.body, "notification request");

    const result = await orchestrator.accept(token, body, request.id);

    if (result.rateLimit) {
      setRateLimitHeaders(reply, result.rateLimit);
    }

    // Cached bytes go out as-is so replays are identical
    return reply.status(202).type("application/json").send(result.body);
  });

  // Current status of one notification
  app.get<{ Params: { id: string } }>(`${API_PREFIX}/notifications/:id/status`, async (request, reply) => {
    const token = extractBearerToken(request.headers.authorization);
    const record = await orchestrator.getStatus(token, request.params.id);

    return reply.send(successEnvelope(record, "Notification status retrieved"));
  });

  // Delivery updates from the email and push services
  app.post<{ Params: { preference: string } }>(`${API_PREFIX}/:preference/status`, async (request, reply) => {
    const update = parseOrThrow(statusUpdateSchema, request.body, "status update");
    const ack = await orchestrator.updateStatus(request.params.preference, update);

    return reply.send(successEnvelope(ack, "Notification status updated successfully"));
  });

  // The caller's notifications, newest first
  app.get(`${API_PREFIX}/notifications`, async (request, reply) => {
    const token = extractBearerToken(request.headers.authorization);
    const { page, limit } = parseOrThrow(listQuerySchema, request.query, "pagination parameters");

    const { items, meta } = await orchestrator.list(token, page, limit);

    return reply.send(successEnvelope(items, "Notifications retrieved", meta));
  });

  app.post(`${API_PREFIX}/auth/verify`, async (request, reply) => {
    const token = extractBearerToken(request.headers.authorization);
    const { identity } = orchestrator.authenticate(token);

    return reply.send(successEnvelope({ valid: true, user_id: identity }, "Token is valid"));
  });
}
