export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PaginationConfig {
  defaultPageSize: number;
  maxPageSize: number;
  ttlMs: number;
  sweepIntervalMs: number;
  /** Handler results longer than this are wrapped into a context. */
  inlineResultLimit: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface CatalogConfig {
  extraDirs: string[];
  disabledTools: string[];
}

export interface ServerConfig {
  name: string;
  version: string;
}

export interface MarqueeConfig {
  pagination: PaginationConfig;
  logging: LoggingConfig;
  catalog: CatalogConfig;
  server: ServerConfig;
}
