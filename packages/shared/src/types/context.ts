export interface ContextInfo {
  id: string;
  total: number;
  pageSize: number;
  totalPages: number;
  /** ISO-8601 UTC */
  createdAt: string;
  /** ISO-8601 UTC */
  expiresAt: string;
}

export interface PageView<T = unknown> {
  contextId: string;
  data: T[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface CreateContextOptions {
  pageSize?: number;
  /** Whatever produced the sequence; kept for diagnostics only. */
  query?: unknown;
}
