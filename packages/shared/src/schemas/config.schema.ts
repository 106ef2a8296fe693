import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const paginationConfigSchema = z.object({
  defaultPageSize: z.number().int().positive().default(50),
  maxPageSize: z.number().int().positive().default(1000),
  ttlMs: z.number().int().positive().default(3_600_000),
  sweepIntervalMs: z.number().int().min(1_000).default(300_000),
  inlineResultLimit: z.number().int().positive().default(100),
}).refine(p => p.defaultPageSize <= p.maxPageSize, {
  message: 'defaultPageSize must not exceed maxPageSize',
  path: ['defaultPageSize'],
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const catalogConfigSchema = z.object({
  extraDirs: z.array(z.string()).default([]),
  disabledTools: z.array(z.string()).default([]),
});

export const serverConfigSchema = z.object({
  name: z.string().min(1).default('marquee'),
  version: z.string().min(1).default('0.1.0'),
});

export const marqueeConfigSchema = z.object({
  pagination: paginationConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  catalog: catalogConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});
