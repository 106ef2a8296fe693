import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type MarqueeConfig,
  DEFAULT_CONFIG,
  marqueeConfigSchema,
  ConfigError,
} from '@marquee/shared';

export const CONFIG_FILE_NAMES = ['marquee.config.yaml', 'marquee.config.yml', 'marquee.config.json'];

export const CONFIG_ENV_VARS = [
  'MARQUEE_LOG_LEVEL',
  'MARQUEE_CONTEXT_TTL_MS',
  'MARQUEE_DEFAULT_PAGE_SIZE',
  'MARQUEE_MAX_PAGE_SIZE',
  'MARQUEE_SWEEP_INTERVAL_MS',
  'MARQUEE_INLINE_RESULT_LIMIT',
  'MARQUEE_DISABLED_TOOLS',
] as const;

const PAGINATION_ENV: Array<[string, keyof MarqueeConfig['pagination']]> = [
  ['MARQUEE_CONTEXT_TTL_MS', 'ttlMs'],
  ['MARQUEE_DEFAULT_PAGE_SIZE', 'defaultPageSize'],
  ['MARQUEE_MAX_PAGE_SIZE', 'maxPageSize'],
  ['MARQUEE_SWEEP_INTERVAL_MS', 'sweepIntervalMs'],
  ['MARQUEE_INLINE_RESULT_LIMIT', 'inlineResultLimit'],
];

export class ConfigManager {
  private config: MarqueeConfig = DEFAULT_CONFIG;

  /** Defaults, then the config file, then environment variables; validated last. */
  async load(options?: { configPath?: string }): Promise<MarqueeConfig> {
    let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

    const fileConfig = await this.loadConfigFile(options?.configPath);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    merged = deepMerge(merged, this.loadEnvVars());

    const result = marqueeConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof MarqueeConfig>(key: K): MarqueeConfig[K] {
    return this.config[key];
  }

  getAll(): MarqueeConfig {
    return this.config;
  }

  private async loadConfigFile(configPath?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      return this.parseConfigFile(configPath);
    }

    // Search cwd and parent directories, first match wins
    let dir = resolve(process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(): Record<string, unknown> {
    const config: Record<string, unknown> = {};
    const env = process.env;

    if (env.MARQUEE_LOG_LEVEL) {
      config.logging = { level: env.MARQUEE_LOG_LEVEL };
    }

    const pagination: Record<string, unknown> = {};
    for (const [name, key] of PAGINATION_ENV) {
      const raw = env[name];
      if (raw) {
        pagination[key] = Number(raw);
      }
    }
    if (Object.keys(pagination).length > 0) {
      config.pagination = pagination;
    }

    if (env.MARQUEE_DISABLED_TOOLS) {
      config.catalog = {
        disabledTools: env.MARQUEE_DISABLED_TOOLS.split(',').map(s => s.trim()).filter(Boolean),
      };
    }

    return config;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const current = target[key];
    if (isRecord(next) && isRecord(current)) {
      result[key] = deepMerge(current, next);
    } else {
      result[key] = next;
    }
  }
  return result;
}
