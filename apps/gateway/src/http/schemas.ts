import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { NOTIFICATION_STATUSES, NOTIFICATION_TYPES } from "../types/index.js";

/** Opaque key-value map, passed through untouched. */
const metadataSchema = z
  .record(z.unknown())
  .nullish()
  .transform((value) => value ?? null);

export const notificationRequestSchema = z.object({
  notification_type: z.enum(NOTIFICATION_TYPES),
  user_id: z.string().uuid(),
  template_code: z.string().trim().min(1),
  variables: z.object({
    name: z.string(),
    link: z.string().url(),
    meta: metadataSchema,
  }),
  request_id: z.string().min(1).default(() => randomUUID()),
  priority: z.number().int().min(1).max(5).default(1),
  metadata: metadataSchema,
});

export const statusUpdateSchema = z.object({
  notification_id: z.string().min(1),
  status: z.enum(NOTIFICATION_STATUSES),
  timestamp: z.string().datetime({ offset: true }).optional(),
  error: z.string().nullish(),
});

export const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

/**
 * Parse `value` or throw a ValidationError carrying every issue path.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}
