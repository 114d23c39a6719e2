export interface PaginationMeta {
  total: number;
  limit: number;
  page: number;
  total_pages: number;
  has_next: boolean;
  has_previous: boolean;
}

/** Response body of every endpoint except /health. */
export interface ResponseEnvelope<T = unknown> {
  success: boolean;
  data: T | null;
  error: string | null;
  message: string;
  meta: PaginationMeta | null;
}
