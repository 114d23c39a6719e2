import type { PaginationMeta, ResponseEnvelope } from "../../types/index.js";

export function successEnvelope<T>(
  data: T,
  message: string,
  meta: PaginationMeta | null = null
): ResponseEnvelope<T> {
  return { success: true, data, error: null, message, meta };
}

export function errorEnvelope(
  error: string,
  message: string = error,
  data: unknown = null
): ResponseEnvelope {
  return { success: false, data, error, message, meta: null };
}
