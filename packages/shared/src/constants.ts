import type { MarqueeConfig } from './types/config.js';

export const DEFAULT_CONFIG: MarqueeConfig = {
  pagination: {
    defaultPageSize: 50,
    maxPageSize: 1000,
    ttlMs: 3_600_000,
    sweepIntervalMs: 300_000,
    inlineResultLimit: 100,
  },
  logging: {
    level: 'info',
  },
  catalog: {
    extraDirs: [],
    disabledTools: [],
  },
  server: {
    name: 'marquee',
    version: '0.1.0',
  },
};

export const CONTEXT_ID_PREFIX = 'ctx';

/** Field name reported on UNKNOWN_TOOL errors. */
export const TOOL_NAME_FIELD = 'tool_name';

export const BUILTIN_TOOL_NAMES = {
  validateToolCall: 'validate_tool_call',
  createSearchContext: 'create_search_context',
  getContextPage: 'get_context_page',
  getContextInfo: 'get_context_info',
} as const;
