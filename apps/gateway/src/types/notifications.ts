/**
 * Notification domain types.
 *
 * Wire field names are snake_case: the queue message, the status record and
 * the HTTP bodies are shared with the downstream email/push services.
 */

export const NOTIFICATION_TYPES = ["email", "push"] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export const NOTIFICATION_STATUSES = ["pending", "delivered", "failed"] as const;
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number];

/** Opaque pass-through map. Never interpreted by the gateway. */
export type Metadata = Record<string, unknown>;

export interface TemplateVariables {
  name: string;
  /** Absolute URL */
  link: string;
  meta: Metadata | null;
}

/** The unit of work handed to the queue. */
export interface NotificationJob {
  notification_id: string;
  correlation_id: string;
  user_id: string;
  notification_type: NotificationType;
  template_code: string;
  variables: TemplateVariables;
  /** 1 (lowest) to 5 (highest) */
  priority: number;
  metadata: Metadata | null;
  created_at: string;
  /** Incremented by downstream consumers only */
  retry_count: number;
}

export interface NotificationStatusRecord {
  notification_id: string;
  status: NotificationStatus;
  notification_type: NotificationType;
  user_id: string;
  template_code: string;
  created_at: string;
  updated_at?: string;
  error_message?: string | null;
}

/** Fields a downstream service may change on an existing record. */
export interface StatusUpdate {
  status: NotificationStatus;
  updated_at: string;
  error_message: string | null;
  notification_type: NotificationType;
}

/** Validated body of POST /notifications. */
export interface NotificationRequest {
  notification_type: NotificationType;
  user_id: string;
  template_code: string;
  variables: TemplateVariables;
  request_id: string;
  priority: number;
  metadata: Metadata | null;
}

/** Validated body of POST /{email|push}/status. */
export interface StatusUpdateRequest {
  notification_id: string;
  status: NotificationStatus;
  timestamp?: string;
  error?: string | null;
}

export interface AcceptedNotification {
  notification_id: string;
  status: "pending";
  request_id: string;
  notification_type: NotificationType;
}
