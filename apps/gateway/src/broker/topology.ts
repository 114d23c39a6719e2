/**
 * Broker topology. Names and arguments are shared with the email and push
 * consumers and must not change.
 */

import type { NotificationType } from "../types/index.js";

export const NOTIFICATION_EXCHANGE = "notifications.direct";
export const DEAD_LETTER_EXCHANGE = "notifications.dlx";
export const FAILED_QUEUE = "failed.queue";

export interface QueueBinding {
  queue: string;
  routingKey: string;
}

export const QUEUE_BINDINGS: Record<NotificationType, QueueBinding> = {
  email: { queue: "email.queue", routingKey: "notification.email" },
  push: { queue: "push.queue", routingKey: "notification.push" },
};

export function routingKeyFor(type: NotificationType): string {
  return QUEUE_BINDINGS[type].routingKey;
}
