import { randomUUID } from "node:crypto";
import {
  CircuitOpenError,
  NotFoundError,
  PublishFailedError,
  RateLimitExceededError,
  ValidationError,
} from "../errors.js";
import { log } from "../logger.js";
import {
  idempotentReplaysTotal,
  notificationsAcceptedTotal,
  publishFailuresTotal,
  rateLimitRejectionsTotal,
} from "../metrics.js";
import type { CircuitBreaker } from "../domain/circuit-breaker/index.js";
import { successEnvelope } from "../domain/utils/envelope.js";
import { buildPaginationMeta } from "../domain/utils/pagination.js";
import { routingKeyFor } from "../broker/topology.js";
import {
  NOTIFICATION_TYPES,
  type AcceptedNotification,
  type NotificationJob,
  type NotificationRequest,
  type NotificationStatusRecord,
  type NotificationType,
  type PaginationMeta,
  type StatusUpdateRequest,
} from "../types/index.js";
import type { AuthValidator, VerifiedToken } from "./auth.js";
import type { IdempotencyCache } from "./idempotency-cache.js";
import type { RateLimiter, RateLimitResult } from "./rate-limiter.js";
import type { NotificationStatusStore } from "./status-store.js";

/** Anything that can put a job on the queue under a routing key. */
export interface JobPublisher {
  publish(routingKey: string, job: NotificationJob): Promise<void>;
}

export interface NotificationOrchestratorDeps {
  auth: AuthValidator;
  rateLimiter: RateLimiter;
  idempotency: IdempotencyCache;
  statusStore: NotificationStatusStore;
  publisher: JobPublisher;
  /** Wraps every publish */
  breaker: CircuitBreaker;
  /** Skip admission control entirely (load testing) */
  rateLimitDisabled?: boolean;
  generateId?: () => string;
  now?: () => Date;
}

export interface AcceptResult {
  /** Serialized response envelope, byte-identical on replay */
  body: string;
  replayed: boolean;
  /** Null when rate limiting is disabled */
  rateLimit: RateLimitResult | null;
}

export interface StatusUpdateAck {
  notification_id: string;
  status: StatusUpdateRequest["status"];
  updated: true;
}

export interface NotificationPage {
  items: NotificationStatusRecord[];
  meta: PaginationMeta;
}

function isNotificationType(value: string): value is NotificationType {
  return NOTIFICATION_TYPES.some((type) => type === value);
}

/**
 * Intake workflow for notification requests.
 *
 * `accept` runs its steps strictly in order and stops at the first failure:
 * authenticate, admit, dedupe, build the job, publish through the breaker,
 * record status, cache the response. A status record is written only after
 * the publish succeeded.
 */
export class NotificationOrchestrator {
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(private readonly deps: NotificationOrchestratorDeps) {
    this.generateId = deps.generateId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  authenticate(token: string): VerifiedToken {
    return this.deps.auth.verify(token);
  }

  async accept(
    token: string,
    request: NotificationRequest,
    correlationId: string
  ): Promise<AcceptResult> {
    const { identity } = this.authenticate(token);

    const rateLimit = await this.admit(identity);

    const cached = await this.deps.idempotency.lookup(request.request_id);
    if (cached !== null) {
      idempotentReplaysTotal.inc();
      return { body: cached, replayed: true, rateLimit };
    }

    const createdAt = this.now().toISOString();
    const job: NotificationJob = {
      notification_id: this.generateId(),
      correlation_id: correlationId,
      user_id: request.user_id,
      notification_type: request.notification_type,
      template_code: request.template_code,
      variables: request.variables,
      priority: request.priority,
      metadata: request.metadata,
      created_at: createdAt,
      retry_count: 0,
    };

    await this.publish(job);

    await this.deps.statusStore.setStatus({
      notification_id: job.notification_id,
      status: "pending",
      notification_type: job.notification_type,
      user_id: job.user_id,
      template_code: job.template_code,
      created_at: createdAt,
    });

    const accepted: AcceptedNotification = {
      notification_id: job.notification_id,
      status: "pending",
      request_id: request.request_id,
      notification_type: job.notification_type,
    };
    const body = JSON.stringify(successEnvelope(accepted, "Notification queued for processing"));

    await this.deps.idempotency.store(request.request_id, body);

    notificationsAcceptedTotal.inc({ type: job.notification_type });
    log.notification.info({
      notificationId: job.notification_id,
      type: job.notification_type,
      userId: job.user_id,
      template: job.template_code,
    }, "queued");

    return { body, replayed: false, rateLimit };
  }

  async getStatus(token: string, notificationId: string): Promise<NotificationStatusRecord> {
    this.authenticate(token);

    const record = await this.deps.statusStore.getStatus(notificationId);
    if (!record) {
      throw new NotFoundError(`Notification ${notificationId} not found`);
    }
    return record;
  }

  /**
   * Apply a delivery update reported by the email or push service.
   * Never creates a record.
   */
  async updateStatus(preference: string, update: StatusUpdateRequest): Promise<StatusUpdateAck> {
    if (!isNotificationType(preference)) {
      throw new ValidationError("Invalid notification preference. Must be 'email' or 'push'", [
        { path: "notification_preference", message: "Must be 'email' or 'push'" },
      ]);
    }

    const merged = await this.deps.statusStore.updateStatus(update.notification_id, {
      status: update.status,
      notification_type: preference,
      updated_at: update.timestamp ?? this.now().toISOString(),
      error_message: update.error ?? null,
    });

    if (!merged) {
      throw new NotFoundError(`Notification ${update.notification_id} not found`);
    }

    log.notification.info({
      notificationId: update.notification_id,
      status: update.status,
      preference,
    }, "status updated");

    return { notification_id: update.notification_id, status: update.status, updated: true };
  }

  async list(token: string, page: number, limit: number): Promise<NotificationPage> {
    const { identity } = this.authenticate(token);

    const { items, total } = await this.deps.statusStore.listForUser(identity, page, limit);
    return { items, meta: buildPaginationMeta(total, page, limit) };
  }

  private async admit(identity: string): Promise<RateLimitResult | null> {
    if (this.deps.rateLimitDisabled) {
      return null;
    }

    const result = await this.deps.rateLimiter.check(identity);
    if (!result.allowed) {
      rateLimitRejectionsTotal.inc();
      throw new RateLimitExceededError(result.limit, result.resetSeconds);
    }
    return result;
  }

  private async publish(job: NotificationJob): Promise<void> {
    const routingKey = routingKeyFor(job.notification_type);

    try {
      await this.deps.breaker.call(
        (key: string, message: NotificationJob) => this.deps.publisher.publish(key, message),
        routingKey,
        job
      );
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        publishFailuresTotal.inc({ reason: "circuit_open" });
        throw error;
      }

      publishFailuresTotal.inc({ reason: "publish_error" });
      log.notification.error({
        notificationId: job.notification_id,
        routingKey,
        error: error instanceof Error ? error.message : String(error),
      }, "publish failed");
      throw new PublishFailedError(error);
    }
  }
}
