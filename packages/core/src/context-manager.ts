import {
  type Clock,
  type ContextInfo,
  type CreateContextOptions,
  type PageView,
  type PaginationConfig,
  CONTEXT_ID_PREFIX,
  ContextNotFoundError,
  DEFAULT_CONFIG,
  generateId,
  systemClock,
} from '@marquee/shared';
import { silentLogger, type Logger } from './logger.js';

interface ResultContext<T> {
  id: string;
  data: readonly T[];
  query: unknown;
  pageSize: number;
  total: number;
  createdAt: Date;
  expiresAt: Date;
}

export interface ContextManagerOptions {
  pagination?: Partial<Pick<PaginationConfig, 'defaultPageSize' | 'maxPageSize' | 'ttlMs' | 'sweepIntervalMs'>>;
  clock?: Clock;
  generateId?: () => string;
  logger?: Logger;
}

export function totalPagesFor(total: number, pageSize: number): number {
  return total === 0 ? 0 : Math.ceil(total / pageSize);
}

/**
 * In-memory store of paginated result sets that expire after a TTL.
 *
 * Every method runs synchronously on the event loop, so reads, writes and the
 * sweep timer never interleave. Expired contexts are dropped lazily on access
 * and eagerly by `sweep()` / the timer started with `start()`; either way an
 * expired id is indistinguishable from one that was never issued.
 */
export class ContextManager<T = unknown> {
  private contexts = new Map<string, ResultContext<T>>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private readonly defaultPageSize: number;
  private readonly maxPageSize: number;
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly clock: Clock;
  private readonly nextId: () => string;
  private readonly logger: Logger;

  constructor(options: ContextManagerOptions = {}) {
    const defaults = DEFAULT_CONFIG.pagination;
    this.defaultPageSize = options.pagination?.defaultPageSize ?? defaults.defaultPageSize;
    this.maxPageSize = options.pagination?.maxPageSize ?? defaults.maxPageSize;
    this.ttlMs = options.pagination?.ttlMs ?? defaults.ttlMs;
    this.sweepIntervalMs = options.pagination?.sweepIntervalMs ?? defaults.sweepIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.nextId = options.generateId ?? (() => generateId(CONTEXT_ID_PREFIX));
    this.logger = options.logger ?? silentLogger;
  }

  /** Entries currently held, including expired ones not yet swept. */
  get size(): number {
    return this.contexts.size;
  }

  create(sequence: readonly T[], options: CreateContextOptions = {}): ContextInfo {
    const pageSize = this.normalizePageSize(options.pageSize);
    const createdAt = this.clock.now();
    const context: ResultContext<T> = {
      id: this.nextId(),
      data: Object.freeze([...sequence]),
      query: options.query,
      pageSize,
      total: sequence.length,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs),
    };

    this.contexts.set(context.id, context);
    this.logger.debug('context created', {
      contextId: context.id,
      total: context.total,
      pageSize,
      query: context.query,
    });

    return this.toInfo(context);
  }

  /**
   * Out-of-range page numbers are clamped to the nearest valid page rather
   * than rejected. `pageSize` overrides the stored size for this request only.
   */
  getPage(contextId: string, page: number, pageSize?: number): PageView<T> {
    const context = this.lookup(contextId);
    const size = pageSize !== undefined && pageSize >= 1 && pageSize <= this.maxPageSize
      ? Math.floor(pageSize)
      : context.pageSize;
    const totalPages = totalPagesFor(context.total, size);
    const current = clampPage(page, totalPages);

    const start = (current - 1) * size;
    const end = Math.min(current * size, context.total);

    return {
      contextId,
      data: context.data.slice(start, end),
      page: current,
      pageSize: size,
      total: context.total,
      totalPages,
      hasNext: current < totalPages,
      hasPrevious: current > 1,
    };
  }

  getInfo(contextId: string): ContextInfo {
    return this.toInfo(this.lookup(contextId));
  }

  delete(contextId: string): boolean {
    const context = this.contexts.get(contextId);
    if (!context) return false;

    this.contexts.delete(contextId);
    return !this.isExpired(context);
  }

  listActive(): ContextInfo[] {
    return Array.from(this.contexts.values())
      .filter(c => !this.isExpired(c))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .map(c => this.toInfo(c));
  }

  sweep(): number {
    let removed = 0;
    for (const [id, context] of this.contexts) {
      if (this.isExpired(context)) {
        this.contexts.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug('expired contexts swept', { removed, remaining: this.contexts.size });
    }
    return removed;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private lookup(contextId: string): ResultContext<T> {
    const context = this.contexts.get(contextId);
    if (!context) {
      throw new ContextNotFoundError(contextId);
    }
    if (this.isExpired(context)) {
      this.contexts.delete(contextId);
      this.logger.debug('context expired on access', { contextId });
      throw new ContextNotFoundError(contextId);
    }
    return context;
  }

  private isExpired(context: ResultContext<T>): boolean {
    return this.clock.now().getTime() >= context.expiresAt.getTime();
  }

  private normalizePageSize(pageSize: number | undefined): number {
    if (pageSize === undefined || !Number.isFinite(pageSize) || pageSize < 1) {
      return this.defaultPageSize;
    }
    return Math.min(Math.floor(pageSize), this.maxPageSize);
  }

  private toInfo(context: ResultContext<T>): ContextInfo {
    return {
      id: context.id,
      total: context.total,
      pageSize: context.pageSize,
      totalPages: totalPagesFor(context.total, context.pageSize),
      createdAt: context.createdAt.toISOString(),
      expiresAt: context.expiresAt.toISOString(),
    };
  }
}

function clampPage(page: number, totalPages: number): number {
  if (!Number.isFinite(page)) return 1;
  return Math.min(Math.max(Math.floor(page), 1), Math.max(totalPages, 1));
}
