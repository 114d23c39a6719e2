/**
 * Key namespaces. Shared with the downstream services, do not rename.
 */
export const keys = {
  notificationStatus: (notificationId: string) => `notification:status:${notificationId}`,
  notificationStatusPattern: () => "notification:status:*",
  idempotent: (requestId: string) => `idempotent:${requestId}`,
  rateLimit: (identifier: string) => `rate_limit:${identifier}`,
};
